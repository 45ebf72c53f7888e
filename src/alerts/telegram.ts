/**
 * Telegram Bot API channel. Each alert carries Applied / Ignore buttons whose
 * callback data (`applied_<id>`, `ignored_<id>`) the dashboard's webhook
 * route turns into status updates.
 */

import { logger } from "../logger";
import { ChannelAuthError, ChannelDeliveryError, errorMessage } from "../errors";
import type { AlertMessage } from "../types";
import {
  escapeHtml,
  isAuthStatus,
  locationLabel,
  readJsonBody,
  type AlertChannel,
  type AlertSession,
  type HttpFetch,
} from "./channel";

const TELEGRAM_API = "https://api.telegram.org";

interface TelegramInlineButton {
  text: string;
  callback_data: string;
}

export interface TelegramChannelOptions {
  botToken: string;
  chatId: string;
  timeoutMs?: number;
  fetchFn?: HttpFetch;
}

function describe(body: unknown, status: number): string {
  if (typeof body === "object" && body !== null && "description" in body) {
    return String(body.description);
  }
  return `HTTP ${status}`;
}

export class TelegramChannel implements AlertChannel {
  readonly name = "telegram";
  private readonly timeoutMs: number;
  private readonly fetchFn: HttpFetch;

  constructor(private readonly options: TelegramChannelOptions) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  format(alert: AlertMessage): string {
    return [
      `<b>${escapeHtml(alert.company)}</b> - ${escapeHtml(alert.title)}`,
      `📍 ${escapeHtml(locationLabel(alert.location))}`,
      `🔗 <a href="${escapeHtml(alert.url.trim())}">${escapeHtml(alert.url)}</a>`,
    ].join("\n");
  }

  private async call(method: string, body?: Record<string, unknown>): Promise<unknown> {
    const response = await this.fetchFn(
      `${TELEGRAM_API}/bot${this.options.botToken}/${method}`,
      {
        method: body ? "POST" : "GET",
        headers: body ? { "Content-Type": "application/json" } : undefined,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      },
    );
    const payload = await readJsonBody(response);

    if (isAuthStatus(response.status)) {
      throw new ChannelAuthError(
        `Telegram ${method} rejected: ${describe(payload, response.status)}`,
        response.status,
      );
    }
    if (!response.ok) {
      throw new ChannelDeliveryError(
        `Telegram ${method} failed: ${describe(payload, response.status)}`,
        response.status,
      );
    }
    return payload;
  }

  async open(): Promise<AlertSession> {
    if (!this.options.botToken || !this.options.chatId) {
      throw new ChannelAuthError("Telegram bot token or chat ID not configured");
    }

    const me = await this.call("getMe");
    const username =
      typeof me === "object" &&
      me !== null &&
      "result" in me &&
      typeof me.result === "object" &&
      me.result !== null &&
      "username" in me.result
        ? String(me.result.username)
        : "unknown";
    logger.info(`Telegram channel ready (bot @${username})`);

    let open = true;

    return {
      send: async (alert) => {
        if (!open) throw new ChannelDeliveryError("Telegram session is closed");

        const keyboard: TelegramInlineButton[][] = [
          [
            { text: "✅ Applied", callback_data: `applied_${alert.postingId}` },
            { text: "🚫 Ignore", callback_data: `ignored_${alert.postingId}` },
          ],
        ];

        await this.call("sendMessage", {
          chat_id: this.options.chatId,
          text: this.format(alert),
          parse_mode: "HTML",
          disable_web_page_preview: true,
          reply_markup: { inline_keyboard: keyboard },
        });
      },
      close: async () => {
        open = false;
        logger.debug("Telegram channel closed");
      },
    };
  }
}

/**
 * Acknowledges an inline button press so the client stops its spinner.
 * Failures are logged, never thrown: the status update has already happened.
 */
export async function answerCallbackQuery(
  botToken: string,
  callbackQueryId: string,
  text: string,
  fetchFn: HttpFetch = (url, init) => fetch(url, init),
): Promise<void> {
  try {
    const response = await fetchFn(`${TELEGRAM_API}/bot${botToken}/answerCallbackQuery`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        callback_query_id: callbackQueryId,
        text,
        show_alert: false,
      }),
      signal: AbortSignal.timeout(15000),
    });
    if (!response.ok) {
      logger.warn(`answerCallbackQuery failed: HTTP ${response.status}`);
    }
  } catch (error) {
    logger.error(`answerCallbackQuery failed: ${errorMessage(error)}`);
  }
}
