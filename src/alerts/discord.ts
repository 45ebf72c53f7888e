import { logger } from "../logger";
import { ChannelAuthError, ChannelDeliveryError } from "../errors";
import type { AlertMessage } from "../types";
import {
  isAuthStatus,
  locationLabel,
  readJsonBody,
  type AlertChannel,
  type AlertSession,
  type HttpFetch,
} from "./channel";

const DISCORD_API = "https://discord.com/api/v10";

export interface DiscordChannelOptions {
  botToken: string;
  channelId: string;
  timeoutMs?: number;
  fetchFn?: HttpFetch;
}

function describe(body: unknown, status: number): string {
  if (typeof body === "object" && body !== null && "message" in body) {
    return `${String(body.message)} (HTTP ${status})`;
  }
  return `HTTP ${status}`;
}

/** Discord bot REST channel: posts one markdown message per alert. */
export class DiscordChannel implements AlertChannel {
  readonly name = "discord";
  private readonly timeoutMs: number;
  private readonly fetchFn: HttpFetch;

  constructor(private readonly options: DiscordChannelOptions) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  format(alert: AlertMessage): string {
    return [
      `**${alert.company}** - ${alert.title}`,
      `*Location:* ${locationLabel(alert.location)}`,
      `<${alert.url}>`,
    ].join("\n");
  }

  private async request(
    path: string,
    body?: Record<string, unknown>,
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bot ${this.options.botToken}`,
    };
    if (body) headers["Content-Type"] = "application/json";

    const response = await this.fetchFn(`${DISCORD_API}${path}`, {
      method: body ? "POST" : "GET",
      headers,
      body: body ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const payload = await readJsonBody(response);

    if (isAuthStatus(response.status)) {
      throw new ChannelAuthError(
        `Discord ${path} rejected: ${describe(payload, response.status)}`,
        response.status,
      );
    }
    if (!response.ok) {
      throw new ChannelDeliveryError(
        `Discord ${path} failed: ${describe(payload, response.status)}`,
        response.status,
      );
    }
    return payload;
  }

  async open(): Promise<AlertSession> {
    if (!this.options.botToken || !this.options.channelId) {
      throw new ChannelAuthError("Discord bot token or channel ID not configured");
    }

    await this.request("/users/@me");
    await this.request(`/channels/${this.options.channelId}`);
    logger.info(`Discord channel ${this.options.channelId} ready`);

    let open = true;

    return {
      send: async (alert) => {
        if (!open) throw new ChannelDeliveryError("Discord session is closed");
        await this.request(`/channels/${this.options.channelId}/messages`, {
          content: this.format(alert),
        });
      },
      close: async () => {
        open = false;
        logger.debug("Discord channel closed");
      },
    };
  }
}
