import { openDatabase, type SqliteDatabase } from "../src/db";
import { PostingStore } from "../src/db/operations";
import type { AppConfig, Preferences } from "../src/config";
import type { NewPosting } from "../src/types";

export function makePreferences(overrides: Partial<Preferences> = {}): Preferences {
  return {
    titles: [],
    exclusions: [],
    location: ["any"],
    seniority: ["any"],
    department: ["any"],
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: {
      telegramBotToken: "test-token",
      telegramChatId: "test-chat",
      discordBotToken: "",
      discordChannelId: "",
      databasePath: ":memory:",
      dryRun: false,
      timezone: "UTC",
      nodeEnv: "test",
      host: "127.0.0.1",
      port: 3000,
    },
    targets: [],
    scraping: {
      userAgent: "TestAgent/1.0",
      requestDelaySeconds: 0,
      maxRetries: 1,
      timeoutSeconds: 5,
      schedule: "09:00",
    },
    preferences: makePreferences(),
    notifications: {
      enabled: true,
      channel: "telegram",
      maxAlertsPerRun: 10,
      minSendIntervalMs: 0,
    },
    ...overrides,
  };
}

/** Clock that advances one second per call, starting at 2024-01-01T00:00:00Z. */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

export function makeStore(): { db: SqliteDatabase; store: PostingStore } {
  const db = openDatabase(":memory:");
  return { db, store: new PostingStore(db, { now: steppingClock() }) };
}

export function newPosting(overrides: Partial<NewPosting> = {}): NewPosting {
  return {
    company: "Acme",
    title: "Backend Engineer",
    url: "https://acme.test/careers/job/1",
    location: "Remote",
    description: null,
    postedAt: null,
    ...overrides,
  };
}
