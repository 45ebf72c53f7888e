import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Notifier, createAlertChannel, type NotifierStore } from "../src/alerts";
import { TelegramChannel } from "../src/alerts/telegram";
import { DiscordChannel } from "../src/alerts/discord";
import { DryRunChannel, type AlertChannel, type HttpFetch } from "../src/alerts/channel";
import { ChannelAuthError, ChannelDeliveryError } from "../src/errors";
import type { PostingStore } from "../src/db/operations";
import type { SqliteDatabase } from "../src/db";
import type { AlertMessage } from "../src/types";
import { makeConfig, makeStore, newPosting } from "./helpers";

class FakeChannel implements AlertChannel {
  readonly name = "fake";
  readonly sent: number[] = [];
  opened = 0;
  closed = 0;

  constructor(private readonly failures: Map<number, Error> = new Map()) {}

  format(alert: AlertMessage): string {
    return `${alert.company} - ${alert.title}`;
  }

  async open() {
    this.opened++;
    return {
      send: async (alert: AlertMessage) => {
        const failure = this.failures.get(alert.postingId);
        if (failure) throw failure;
        this.sent.push(alert.postingId);
      },
      close: async () => {
        this.closed++;
      },
    };
  }
}

function seed(store: PostingStore, count: number): number[] {
  const ids: number[] = [];
  for (let n = 1; n <= count; n++) {
    const r = store.insertIfAbsent(newPosting({ url: `https://acme.test/job/${n}`, title: `Job ${n}` }));
    if (r.status === "created") ids.push(r.posting.id);
  }
  // Newest first, matching the alert order
  return ids.reverse();
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("Notifier", () => {
  let db: SqliteDatabase;
  let store: PostingStore;

  beforeEach(() => {
    ({ db, store } = makeStore());
  });

  afterEach(() => {
    db.close();
  });

  it("sends at most cap alerts and holds the rest", async () => {
    const ids = seed(store, 5);
    const channel = new FakeChannel();
    const notifier = new Notifier(store, channel, { minSendIntervalMs: 0 });

    const result = await notifier.notify(3);

    expect(result).toEqual({ delivered: 3, failed: 0, held: 2, aborted: false });
    expect(channel.sent).toEqual(ids.slice(0, 3));
    expect(store.selectUnnotifiedAcceptable().map((p) => p.id)).toEqual(ids.slice(3));
    expect(channel.closed).toBe(1);
  });

  it("does not open the channel when nothing is pending", async () => {
    const channel = new FakeChannel();
    const result = await new Notifier(store, channel, { minSendIntervalMs: 0 }).notify(10);

    expect(result).toEqual({ delivered: 0, failed: 0, held: 0, aborted: false });
    expect(channel.opened).toBe(0);
  });

  it("holds everything when the cap is zero", async () => {
    seed(store, 2);
    const channel = new FakeChannel();
    const result = await new Notifier(store, channel, { minSendIntervalMs: 0 }).notify(0);

    expect(result).toEqual({ delivered: 0, failed: 0, held: 2, aborted: false });
    expect(channel.opened).toBe(0);
  });

  it("skips a transient failure and leaves that posting pending", async () => {
    const ids = seed(store, 3);
    const channel = new FakeChannel(new Map([[ids[1], new ChannelDeliveryError("HTTP 500")]]));
    const notifier = new Notifier(store, channel, { minSendIntervalMs: 0 });

    const result = await notifier.notify(10);

    expect(result).toEqual({ delivered: 2, failed: 1, held: 0, aborted: false });
    expect(channel.sent).toEqual([ids[0], ids[2]]);
    expect(store.selectUnnotifiedAcceptable().map((p) => p.id)).toEqual([ids[1]]);
    expect(store.stats()).toMatchObject({ notificationsSent: 2, notificationsFailed: 1 });
  });

  it("does not count failures toward the cap", async () => {
    const ids = seed(store, 4);
    const channel = new FakeChannel(new Map([[ids[0], new ChannelDeliveryError("HTTP 500")]]));

    const result = await new Notifier(store, channel, { minSendIntervalMs: 0 }).notify(2);

    expect(result).toEqual({ delivered: 2, failed: 1, held: 1, aborted: false });
    expect(channel.sent).toEqual([ids[1], ids[2]]);
  });

  it("aborts on an auth error and still closes the session", async () => {
    const ids = seed(store, 4);
    const channel = new FakeChannel(new Map([[ids[1], new ChannelAuthError("Forbidden", 403)]]));

    const result = await new Notifier(store, channel, { minSendIntervalMs: 0 }).notify(10);

    expect(result).toEqual({ delivered: 1, failed: 1, held: 2, aborted: true });
    expect(channel.sent).toEqual([ids[0]]);
    expect(channel.closed).toBe(1);
    expect(store.selectUnnotifiedAcceptable()).toHaveLength(3);
  });

  it("holds everything when the channel cannot be opened", async () => {
    seed(store, 2);
    const channel: AlertChannel = {
      name: "broken",
      format: () => "",
      open: async () => {
        throw new ChannelAuthError("bad token", 401);
      },
    };

    const result = await new Notifier(store, channel, { minSendIntervalMs: 0 }).notify(10);

    expect(result).toEqual({ delivered: 0, failed: 0, held: 2, aborted: true });
  });

  it("marks a delivered posting even when the notification log fails", async () => {
    const ids = seed(store, 1);
    const brokenLog: NotifierStore = {
      selectUnnotifiedAcceptable: () => store.selectUnnotifiedAcceptable(),
      markNotified: (id) => store.markNotified(id),
      logNotification: () => {
        throw new Error("disk I/O error");
      },
    };

    const result = await new Notifier(brokenLog, new FakeChannel(), { minSendIntervalMs: 0 }).notify(10);

    expect(result).toEqual({ delivered: 1, failed: 0, held: 0, aborted: false });
    expect(store.getPosting(ids[0])?.notified).toBe(true);
  });

  it("stops with partial counts when a delivered posting cannot be marked", async () => {
    const ids = seed(store, 3);
    const channel = new FakeChannel();
    const lockedStore: NotifierStore = {
      selectUnnotifiedAcceptable: () => store.selectUnnotifiedAcceptable(),
      markNotified: (id) => {
        if (id === ids[1]) throw new Error("database is locked");
        return store.markNotified(id);
      },
      logNotification: store.logNotification.bind(store),
    };

    const result = await new Notifier(lockedStore, channel, { minSendIntervalMs: 0 }).notify(10);

    expect(result).toEqual({ delivered: 2, failed: 0, held: 1, aborted: true });
    expect(channel.sent).toEqual([ids[0], ids[1]]);
    expect(channel.closed).toBe(1);
    expect(store.stats()).toMatchObject({ notificationsSent: 2 });
  });

  it("waits between sends but not before the first", async () => {
    seed(store, 3);
    const sleep = vi.fn(async (_ms: number) => {});
    const notifier = new Notifier(store, new FakeChannel(), { minSendIntervalMs: 250, sleep });

    await notifier.notify(10);

    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });
});

describe("TelegramChannel", () => {
  const alert: AlertMessage = {
    postingId: 7,
    company: "Acme & Co",
    title: "Backend <Engineer>",
    location: null,
    url: "https://acme.test/job/7",
  };

  it("formats HTML with escaped fields and an unknown location", () => {
    const channel = new TelegramChannel({ botToken: "test-token", chatId: "42" });
    expect(channel.format(alert)).toBe(
      [
        "<b>Acme &amp; Co</b> - Backend &lt;Engineer&gt;",
        "📍 Unknown",
        '🔗 <a href="https://acme.test/job/7">https://acme.test/job/7</a>',
      ].join("\n"),
    );
  });

  it("checks the bot, then sends with status buttons", async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(jsonResponse({ ok: true, result: { username: "test_bot" } }))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const channel = new TelegramChannel({ botToken: "test-token", chatId: "42", fetchFn });

    const session = await channel.open();
    await session.send(alert);
    await session.close();

    expect(fetchFn.mock.calls[0][0]).toBe("https://api.telegram.org/bottest-token/getMe");
    const [url, init] = fetchFn.mock.calls[1];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(JSON.parse(String(init?.body))).toMatchObject({
      chat_id: "42",
      parse_mode: "HTML",
      reply_markup: {
        inline_keyboard: [
          [
            { text: "✅ Applied", callback_data: "applied_7" },
            { text: "🚫 Ignore", callback_data: "ignored_7" },
          ],
        ],
      },
    });
  });

  it("maps 401 to an auth error", async () => {
    const fetchFn = vi.fn<HttpFetch>(async () =>
      jsonResponse({ ok: false, description: "Unauthorized" }, 401),
    );
    const channel = new TelegramChannel({ botToken: "test-token", chatId: "42", fetchFn });

    await expect(channel.open()).rejects.toBeInstanceOf(ChannelAuthError);
  });

  it("refuses to open without credentials", async () => {
    const fetchFn = vi.fn<HttpFetch>();
    const channel = new TelegramChannel({ botToken: "", chatId: "42", fetchFn });

    await expect(channel.open()).rejects.toThrow("not configured");
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("maps other failures to delivery errors", async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(jsonResponse({ ok: true, result: { username: "test_bot" } }))
      .mockResolvedValueOnce(jsonResponse({ ok: false, description: "Too Many Requests" }, 429));
    const session = await new TelegramChannel({ botToken: "test-token", chatId: "42", fetchFn }).open();

    await expect(session.send(alert)).rejects.toThrow(
      new ChannelDeliveryError("Telegram sendMessage failed: Too Many Requests"),
    );
  });
});

describe("DiscordChannel", () => {
  const alert: AlertMessage = {
    postingId: 3,
    company: "Acme",
    title: "SRE",
    location: "Remote",
    url: "https://acme.test/job/3",
  };

  it("formats markdown", () => {
    const channel = new DiscordChannel({ botToken: "test-token", channelId: "99" });
    expect(channel.format(alert)).toBe(
      "**Acme** - SRE\n*Location:* Remote\n<https://acme.test/job/3>",
    );
  });

  it("verifies the bot and channel before posting", async () => {
    const fetchFn = vi.fn<HttpFetch>(async () => jsonResponse({ id: "1" }));
    const channel = new DiscordChannel({ botToken: "test-token", channelId: "99", fetchFn });

    const session = await channel.open();
    await session.send(alert);

    expect(fetchFn.mock.calls.map(([url]) => url)).toEqual([
      "https://discord.com/api/v10/users/@me",
      "https://discord.com/api/v10/channels/99",
      "https://discord.com/api/v10/channels/99/messages",
    ]);
    expect(JSON.parse(String(fetchFn.mock.calls[2][1]?.body))).toEqual({
      content: "**Acme** - SRE\n*Location:* Remote\n<https://acme.test/job/3>",
    });
  });

  it("maps 403 on the channel lookup to an auth error", async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(jsonResponse({ id: "1" }))
      .mockResolvedValueOnce(jsonResponse({ message: "Missing Access" }, 403));

    await expect(
      new DiscordChannel({ botToken: "test-token", channelId: "99", fetchFn }).open(),
    ).rejects.toThrow("Discord /channels/99 rejected: Missing Access (HTTP 403)");
  });
});

describe("createAlertChannel", () => {
  it("picks the channel from configuration", () => {
    expect(createAlertChannel(makeConfig())).toBeInstanceOf(TelegramChannel);

    const discord = makeConfig();
    discord.notifications.channel = "discord";
    expect(createAlertChannel(discord)).toBeInstanceOf(DiscordChannel);

    const dry = makeConfig();
    dry.env.dryRun = true;
    expect(createAlertChannel(dry)).toBeInstanceOf(DryRunChannel);
  });
});
