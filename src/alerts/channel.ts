import { logger } from "../logger";
import type { AlertMessage } from "../types";

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export const UNKNOWN_LOCATION = "Unknown";

/** An open connection to the messaging channel, scoped to one Notifier pass. */
export interface AlertSession {
  send(alert: AlertMessage): Promise<void>;
  close(): Promise<void>;
}

export interface AlertChannel {
  readonly name: string;
  format(alert: AlertMessage): string;
  open(): Promise<AlertSession>;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403;
}

export function locationLabel(location: string | null): string {
  const trimmed = location?.trim();
  return trimmed ? trimmed : UNKNOWN_LOCATION;
}

export function plainTextAlert(alert: AlertMessage): string {
  return [
    `${alert.company} - ${alert.title}`,
    `Location: ${locationLabel(alert.location)}`,
    alert.url,
  ].join("\n");
}

/** Parses a JSON error body if there is one; channel APIs are not consistent about it. */
export async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text.slice(0, 200) };
  }
}

export class DryRunChannel implements AlertChannel {
  readonly name = "dry-run";

  format(alert: AlertMessage): string {
    return plainTextAlert(alert);
  }

  async open(): Promise<AlertSession> {
    logger.info("[DRY RUN] Alert channel opened");
    return {
      send: async (alert) => {
        const text = this.format(alert);
        logger.info(`[DRY RUN] Would send alert for posting ${alert.postingId}:`);
        logger.info(text);
      },
      close: async () => {
        logger.info("[DRY RUN] Alert channel closed");
      },
    };
  }
}
