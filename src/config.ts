import { readFileSync, existsSync } from "fs";
import { dirname, isAbsolute, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { logger } from "./logger";
import { ConfigError } from "./errors";

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");
const DEFAULT_CONFIG_DIR = join(PROJECT_ROOT, "config");

const keywordList = z.array(z.string().trim().min(1));

const selectorsSchema = z.object({
  container: z.string().min(1),
  title: z.string().min(1),
  link: z.string().min(1),
  location: z.string().min(1).optional(),
  description: z.string().min(1).optional(),
});

const targetSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  selectors: selectorsSchema.optional(),
});

const targetsFileSchema = z.object({
  description: z.string().optional(),
  targets: z.array(targetSchema),
});

const scrapingSchema = z.object({
  description: z.string().optional(),
  userAgent: z
    .string()
    .min(1)
    .default("Mozilla/5.0 (compatible; CareerCrawler/1.0)"),
  requestDelaySeconds: z.number().nonnegative().default(3),
  maxRetries: z.number().int().min(1).default(3),
  timeoutSeconds: z.number().positive().default(30),
  schedule: z.string().trim().min(1).default("09:00"),
});

const preferencesSchema = z.object({
  description: z.string().optional(),
  titles: keywordList.default([]),
  exclusions: keywordList.default([]),
  location: keywordList.default(["any"]),
  seniority: keywordList.default(["any"]),
  department: keywordList.default(["any"]),
});

const notificationsSchema = z.object({
  description: z.string().optional(),
  enabled: z.boolean().default(false),
  channel: z.enum(["telegram", "discord"]).default("telegram"),
  maxAlertsPerRun: z.number().int().min(0).default(10),
  minSendIntervalMs: z.number().int().min(0).default(1000),
});

export type TargetSelectors = z.infer<typeof selectorsSchema>;
export type Target = z.infer<typeof targetSchema>;
export type ScrapingConfig = z.infer<typeof scrapingSchema>;
export type Preferences = z.infer<typeof preferencesSchema>;
export type NotificationsConfig = z.infer<typeof notificationsSchema>;

export interface EnvConfig {
  telegramBotToken: string;
  telegramChatId: string;
  discordBotToken: string;
  discordChannelId: string;
  databasePath: string;
  dryRun: boolean;
  timezone: string;
  nodeEnv: string;
  host: string;
  port: number;
}

export interface AppConfig {
  env: EnvConfig;
  targets: Target[];
  scraping: ScrapingConfig;
  preferences: Preferences;
  notifications: NotificationsConfig;
}

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

export function stripJsonComments(raw: string): string {
  // Strip comments while preserving string contents (avoid corrupting URLs).
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match, comment) => (comment ? "" : match),
  );
}

function formatIssues(filename: string, error: z.ZodError): string {
  const details = error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return `Invalid config file ${filename}: ${details}`;
}

function loadJsonConfig<S extends z.ZodTypeAny>(
  configDir: string,
  filename: string,
  schema: S,
): z.output<S> {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new ConfigError(`Config file not found: ${filepath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(readFileSync(filepath, "utf-8")));
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${filename}: ${error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(formatIssues(filename, result.error));
  }
  return result.data;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const databasePath = env.DATABASE_PATH ?? "data/careers.db";

  return {
    telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? "",
    telegramChatId: env.TELEGRAM_CHAT_ID ?? "",
    discordBotToken: env.DISCORD_BOT_TOKEN ?? "",
    discordChannelId: env.DISCORD_CHANNEL_ID ?? "",
    databasePath:
      databasePath === ":memory:" || isAbsolute(databasePath)
        ? databasePath
        : join(PROJECT_ROOT, databasePath),
    dryRun: env.DRY_RUN === "true",
    timezone: env.TZ ?? "UTC",
    nodeEnv: env.NODE_ENV ?? "development",
    host: env.HOST ?? "127.0.0.1",
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
  };
}

function hasChannelCredentials(config: AppConfig): boolean {
  if (config.notifications.channel === "discord") {
    return Boolean(config.env.discordBotToken && config.env.discordChannelId);
  }
  return Boolean(config.env.telegramBotToken && config.env.telegramChatId);
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? env.CONFIG_DIR ?? DEFAULT_CONFIG_DIR;

  logger.info(`Loading configuration from ${configDir}...`);

  const config: AppConfig = {
    env: loadEnvConfig(env),
    targets: loadJsonConfig(configDir, "targets.json", targetsFileSchema)
      .targets,
    scraping: loadJsonConfig(configDir, "scraping.json", scrapingSchema),
    preferences: loadJsonConfig(
      configDir,
      "preferences.json",
      preferencesSchema,
    ),
    notifications: loadJsonConfig(
      configDir,
      "notifications.json",
      notificationsSchema,
    ),
  };

  if (config.targets.length === 0) {
    logger.warn("No targets configured in targets.json — nothing to scrape");
  }
  if (config.notifications.enabled && !hasChannelCredentials(config)) {
    logger.warn(
      `${config.notifications.channel} credentials not set — alerts will fail until they are configured`,
    );
  }
  if (config.env.dryRun) {
    logger.info("🧪 DRY RUN MODE — no alerts will be sent");
  }

  logger.info(`Config loaded successfully:`);
  logger.info(`  - ${config.targets.length} targets`);
  logger.info(`  - ${config.preferences.titles.length} title keywords`);
  logger.info(`  - ${config.preferences.exclusions.length} exclusion keywords`);
  logger.info(
    `  - Notifications: ${config.notifications.enabled ? config.notifications.channel : "disabled"}`,
  );
  logger.info(`  - Environment: ${config.env.nodeEnv}`);
  logger.info(`  - Timezone: ${config.env.timezone}`);

  return config;
}
