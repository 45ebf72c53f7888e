import { Hono } from "hono";
import { html } from "hono/html";
import { z } from "zod";
import { logger } from "../logger";
import { answerCallbackQuery } from "../alerts/telegram";
import type { HttpFetch } from "../alerts/channel";
import type { PostingStore } from "../db/operations";
import type { Posting, PostingView, StatusUpdate } from "../types";

export interface DashboardOptions {
  store: PostingStore;
  dryRun: boolean;
  /** Used to acknowledge button presses; callbacks are still applied without it. */
  telegramBotToken?: string;
  fetchFn?: HttpFetch;
}

const STATUS_ACTIONS = new Map<string, StatusUpdate>([
  ["apply", { applied: true }],
  ["unapply", { applied: false }],
  ["ignore", { ignored: true }],
  ["unignore", { ignored: false }],
]);

// Callback data sent by the Telegram alert buttons
const CALLBACK_ACTIONS = new Map<string, StatusUpdate>([
  ["applied", { applied: true }],
  ["ignored", { ignored: true }],
]);

const CALLBACK_REPLIES = new Map<string, string>([
  ["applied", "✅ Marked as applied"],
  ["ignored", "🚫 Ignored"],
]);

const VIEW_TITLES: Record<PostingView, string> = {
  active: "Active Postings",
  applied: "Applied Postings",
  ignored: "Ignored Postings",
};

const telegramUpdateSchema = z.object({
  callback_query: z
    .object({
      id: z.string().optional(),
      data: z.string().optional(),
      from: z.object({ first_name: z.string().optional() }).optional(),
    })
    .optional(),
});

export function parseView(raw: string | undefined): PostingView {
  return raw === "applied" || raw === "ignored" ? raw : "active";
}

function parseId(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : null;
}

function renderPostingRow(posting: Posting, view: PostingView) {
  const actions = view === "applied"
    ? ["unapply"]
    : view === "ignored"
      ? ["unignore"]
      : ["apply", "ignore"];

  return html`<tr>
    <td>${posting.company}</td>
    <td><a href="${posting.url}" target="_blank" rel="noopener">${posting.title}</a></td>
    <td>${posting.location ?? "Unknown"}</td>
    <td>${posting.scrapedAt.slice(0, 10)}</td>
    <td>${posting.notified ? "yes" : "no"}</td>
    <td>
      ${actions.map(
        (action) => html`<form method="post" action="/postings/${posting.id}/${action}" style="display:inline">
          <input type="hidden" name="view" value="${view}" />
          <button type="submit">${action}</button>
        </form>`,
      )}
    </td>
  </tr>`;
}

function renderPage(view: PostingView, postings: Posting[]) {
  return html`<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>${VIEW_TITLES[view]}</title>
  </head>
  <body>
    <nav>
      <a href="/?view=active">Active</a> |
      <a href="/?view=applied">Applied</a> |
      <a href="/?view=ignored">Ignored</a>
    </nav>
    <h1>${VIEW_TITLES[view]} (${postings.length})</h1>
    <table>
      <thead>
        <tr><th>Company</th><th>Title</th><th>Location</th><th>Found</th><th>Alerted</th><th></th></tr>
      </thead>
      <tbody>
        ${postings.map((p) => renderPostingRow(p, view))}
      </tbody>
    </table>
  </body>
</html>`;
}

/** Status dashboard and JSON API over the posting store. */
export function createDashboardApp(options: DashboardOptions): Hono {
  const { store, dryRun, telegramBotToken, fetchFn } = options;
  const app = new Hono();

  const acknowledge = async (callbackQueryId: string | undefined, text: string) => {
    if (!telegramBotToken || !callbackQueryId) return;
    await answerCallbackQuery(telegramBotToken, callbackQueryId, text, fetchFn);
  };

  app.get("/health", (c) => {
    const dbOk = store.isHealthy();

    return c.json({
      status: dbOk ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      dryRun,
      database: {
        ok: dbOk,
        stats: dbOk ? store.stats() : null,
      },
    });
  });

  app.get("/status", (c) => {
    return c.json({
      timestamp: new Date().toISOString(),
      lastRun: store.lastRun(),
      stats: store.stats(),
    });
  });

  app.get("/api/postings", (c) => {
    const view = parseView(c.req.query("view"));
    const postings = store.selectByStatus(view);
    return c.json({ view, count: postings.length, postings });
  });

  app.get("/api/postings/:id", (c) => {
    const id = parseId(c.req.param("id"));
    if (id === null) {
      return c.json({ error: "Invalid posting ID" }, 400);
    }

    const posting = store.getPosting(id);
    if (!posting) {
      return c.json({ error: "Posting not found" }, 404);
    }
    return c.json(posting);
  });

  app.post("/api/postings/:id/:action", (c) => {
    const id = parseId(c.req.param("id"));
    const update = STATUS_ACTIONS.get(c.req.param("action"));

    if (id === null) {
      return c.json({ error: "Invalid posting ID" }, 400);
    }
    if (!update) {
      return c.json({ error: "Unknown action" }, 404);
    }
    if (!store.updateStatus(id, update)) {
      return c.json({ error: "Posting not found" }, 404);
    }

    return c.json({ success: true, action: c.req.param("action"), posting: store.getPosting(id) });
  });

  app.post("/api/telegram/callback", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = telegramUpdateSchema.safeParse(body);
    const query = parsed.success ? parsed.data.callback_query : undefined;
    const data = query?.data;
    if (!data) {
      return c.json({ success: false });
    }

    const [action, idStr] = data.split("_");
    const id = parseId(idStr ?? "");
    const update = CALLBACK_ACTIONS.get(action);

    if (id === null || !update) {
      logger.warn(`Unrecognised Telegram callback data: ${data}`);
      await acknowledge(query?.id, "Unknown action");
      return c.json({ success: false });
    }

    logger.info(`Telegram callback: ${data} from ${query?.from?.first_name ?? "unknown"}`);
    const success = store.updateStatus(id, update);
    await acknowledge(
      query?.id,
      success ? (CALLBACK_REPLIES.get(action) ?? "Done") : "Posting not found",
    );
    return c.json({ success, action, postingId: id });
  });

  app.get("/", (c) => {
    const view = parseView(c.req.query("view"));
    return c.html(renderPage(view, store.selectByStatus(view)));
  });

  app.post("/postings/:id/:action", async (c) => {
    const id = parseId(c.req.param("id"));
    const update = STATUS_ACTIONS.get(c.req.param("action"));
    const body = await c.req.parseBody();
    const view = parseView(typeof body.view === "string" ? body.view : undefined);

    if (id === null || !update) {
      return c.text("Not found", 404);
    }
    if (!store.updateStatus(id, update)) {
      logger.error(`Failed to ${c.req.param("action")} posting ${id}`);
    }
    return c.redirect(`/?view=${view}`);
  });

  return app;
}
