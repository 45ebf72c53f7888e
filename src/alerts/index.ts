/**
 * New-posting alerts.
 *
 * Delivery is at-most-once with a known gap: a posting is marked notified
 * only after the channel confirms the send, so a crash between the two
 * steps re-sends that one alert on the next run.
 */

import { logger } from "../logger";
import { ChannelAuthError, errorMessage } from "../errors";
import { sleep, type SleepFn } from "../connectors/fetcher";
import { DryRunChannel, type AlertChannel, type AlertSession, type HttpFetch } from "./channel";
import { TelegramChannel } from "./telegram";
import { DiscordChannel } from "./discord";
import type { AppConfig } from "../config";
import type { PostingStore } from "../db/operations";
import type { AlertMessage, NotifyResult, Posting } from "../types";

export type NotifierStore = Pick<
  PostingStore,
  "selectUnnotifiedAcceptable" | "markNotified" | "logNotification"
>;

export interface NotifierOptions {
  minSendIntervalMs: number;
  sleep?: SleepFn;
}

export function toAlertMessage(posting: Posting): AlertMessage {
  return {
    postingId: posting.id,
    company: posting.company,
    title: posting.title,
    location: posting.location,
    url: posting.url,
  };
}

export function createAlertChannel(
  config: AppConfig,
  options: { fetchFn?: HttpFetch } = {},
): AlertChannel {
  if (config.env.dryRun) {
    return new DryRunChannel();
  }

  if (config.notifications.channel === "discord") {
    return new DiscordChannel({
      botToken: config.env.discordBotToken,
      channelId: config.env.discordChannelId,
      fetchFn: options.fetchFn,
    });
  }

  return new TelegramChannel({
    botToken: config.env.telegramBotToken,
    chatId: config.env.telegramChatId,
    fetchFn: options.fetchFn,
  });
}

export class Notifier {
  private readonly minSendIntervalMs: number;
  private readonly sleep: SleepFn;

  constructor(
    private readonly store: NotifierStore,
    private readonly channel: AlertChannel,
    options: NotifierOptions,
  ) {
    this.minSendIntervalMs = options.minSendIntervalMs;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Sends alerts for un-notified, non-applied, non-ignored postings, newest
   * first, until `cap` deliveries succeed. Failed sends do not count toward
   * the cap and stay eligible for the next run. Once sending has started,
   * store failures end the pass with partial counts instead of throwing.
   */
  async notify(cap: number): Promise<NotifyResult> {
    const pending = this.store.selectUnnotifiedAcceptable();

    if (pending.length === 0) {
      logger.info("No new postings to notify about");
      return { delivered: 0, failed: 0, held: 0, aborted: false };
    }
    if (cap <= 0) {
      logger.warn(`Alert cap is ${cap} — holding ${pending.length} postings`);
      return { delivered: 0, failed: 0, held: pending.length, aborted: false };
    }

    logger.info(
      `Found ${pending.length} postings to notify about (cap ${cap}) via ${this.channel.name}`,
    );

    let session: AlertSession;
    try {
      session = await this.channel.open();
    } catch (error) {
      logger.error(
        `Could not open ${this.channel.name} channel, holding all alerts: ${errorMessage(error)}`,
      );
      return { delivered: 0, failed: 0, held: pending.length, aborted: true };
    }

    let delivered = 0;
    let failed = 0;
    let attempted = 0;
    let aborted = false;

    try {
      for (const posting of pending) {
        if (delivered >= cap) {
          logger.warn(
            `Reached alert cap (${cap}). Holding remaining postings for next run.`,
          );
          break;
        }

        if (attempted > 0 && this.minSendIntervalMs > 0) {
          await this.sleep(this.minSendIntervalMs);
        }
        attempted++;

        const alert = toAlertMessage(posting);
        const text = this.channel.format(alert);

        try {
          await session.send(alert);
        } catch (error) {
          const msg = errorMessage(error);
          failed++;
          this.record(posting.id, text, false, msg);

          if (error instanceof ChannelAuthError) {
            logger.error(
              `Permission error from ${this.channel.name}: ${msg}. Aborting remaining alerts.`,
            );
            aborted = true;
            break;
          }

          logger.error(`Failed to send alert for posting ID ${posting.id}: ${msg}`);
          continue;
        }

        // Mark first: nothing else may sit between a confirmed send and the flag
        delivered++;
        try {
          if (!this.store.markNotified(posting.id)) {
            logger.warn(
              `Sent alert for posting ID ${posting.id} but could not mark it notified`,
            );
          }
        } catch (error) {
          // Further sends would go out unrecorded and repeat next run
          logger.error(
            `Sent alert for posting ID ${posting.id} but the store failed: ${errorMessage(error)}. Aborting remaining alerts.`,
          );
          this.record(posting.id, text, true, null);
          aborted = true;
          break;
        }

        this.record(posting.id, text, true, null);
        logger.info(`Sent alert for posting ID ${posting.id}: ${posting.title}`);
      }
    } finally {
      try {
        await session.close();
      } catch (error) {
        logger.error(`Error closing ${this.channel.name} channel: ${errorMessage(error)}`);
      }
    }

    const held = pending.length - attempted;
    logger.info(
      `Alerts: ${delivered} delivered, ${failed} failed, ${held} held${aborted ? " (aborted)" : ""}`,
    );

    return { delivered, failed, held, aborted };
  }

  /** Notification log writes are best-effort; a failure never undoes a delivery. */
  private record(
    postingId: number,
    text: string,
    success: boolean,
    error: string | null,
  ): void {
    try {
      this.store.logNotification(postingId, this.channel.name, text, success, error);
    } catch (logError) {
      logger.error(
        `Could not log notification for posting ID ${postingId}: ${errorMessage(logError)}`,
      );
    }
  }
}
