import { logger } from "../logger";
import type { FetchResult } from "../types";

export type FetchFn = (
  input: string,
  init: { signal: AbortSignal; headers: Record<string, string> },
) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export interface FetcherOptions {
  userAgent: string;
  maxRetries: number; // Total attempts, not extra ones
  delayMs: number;
  timeoutMs: number;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Linear backoff: waits `delay * (n + 1)` before attempt index n. */
export function backoffDelayMs(delayMs: number, nextAttemptIndex: number): number {
  return delayMs * (nextAttemptIndex + 1);
}

/**
 * Retrieves career page HTML for one target under a retry/backoff/politeness
 * policy. Never throws: exhausted retries come back as `success: false`.
 */
export class PageFetcher {
  private readonly userAgent: string;
  private readonly maxRetries: number;
  private readonly delayMs: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(options: FetcherOptions) {
    this.userAgent = options.userAgent;
    this.maxRetries = Math.max(1, options.maxRetries);
    this.delayMs = options.delayMs;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
  }

  async fetch(url: string): Promise<FetchResult> {
    const startTime = Date.now();
    let lastError = "";
    let lastStatus: number | undefined;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const response = await this.fetchFn(url, {
          signal: controller.signal,
          headers: {
            Accept: "text/html,application/xhtml+xml,text/xml;q=0.9,*/*;q=0.8",
            "User-Agent": this.userAgent,
          },
        });
        lastStatus = response.status;

        if (response.ok) {
          // Body read stays under the same timeout
          const html = await response.text();
          clearTimeout(timeout);
          logger.debug(`Fetched ${url} (status ${response.status})`);

          // Politeness delay applies even on success
          await this.sleep(this.delayMs);

          return {
            html,
            success: true,
            attempts: attempt + 1,
            responseTimeMs: Date.now() - startTime,
            statusCode: response.status,
          };
        }

        lastError = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`;
      } catch (error) {
        const isAbort = error instanceof Error && error.name === "AbortError";
        lastError = isAbort
          ? `Timeout after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
        lastStatus = undefined;
      } finally {
        clearTimeout(timeout);
      }

      logger.warn(
        `Fetch error on ${url}: ${lastError} (attempt ${attempt + 1}/${this.maxRetries})`,
      );

      if (attempt + 1 < this.maxRetries) {
        const waitMs = backoffDelayMs(this.delayMs, attempt + 1);
        logger.info(`Retrying ${url} in ${waitMs}ms...`);
        await this.sleep(waitMs);
      }
    }

    logger.error(`Failed to fetch ${url} after ${this.maxRetries} attempts`);

    return {
      html: null,
      success: false,
      error: lastError,
      attempts: this.maxRetries,
      responseTimeMs: Date.now() - startTime,
      statusCode: lastStatus,
    };
  }
}
