import cron, { type ScheduledTask } from "node-cron";
import { logger } from "../logger";
import { runPipeline, type PipelineContext } from "../pipeline";
import { ConfigError, errorMessage } from "../errors";
import type { PipelineRunResult } from "../types";

const DAILY_TIME = /^(\d{1,2}):(\d{2})$/;

/** Accepts a daily "HH:MM" time or a full cron expression. */
export function toCronExpression(schedule: string): string {
  const trimmed = schedule.trim();
  const match = DAILY_TIME.exec(trimmed);

  if (match) {
    const hour = Number.parseInt(match[1], 10);
    const minute = Number.parseInt(match[2], 10);
    if (hour > 23 || minute > 59) {
      throw new ConfigError(`Invalid schedule time "${schedule}". Expected HH:MM.`);
    }
    return `${minute} ${hour} * * *`;
  }

  if (cron.validate(trimmed)) {
    return trimmed;
  }

  throw new ConfigError(
    `Invalid schedule "${schedule}". Use HH:MM or a cron expression.`,
  );
}

/**
 * Runs the pipeline unless a previous run is still going. The core pipeline
 * has no locking of its own, so overlapping ticks are dropped here.
 */
export function createGuardedRunner(
  ctx: PipelineContext,
): (runType: string) => Promise<PipelineRunResult | null> {
  let running = false;

  return async (runType) => {
    if (running) {
      logger.warn(`[LOCK] Pipeline already running — skipping ${runType} run`);
      return null;
    }
    running = true;
    try {
      return await runPipeline(ctx, { runType });
    } finally {
      running = false;
    }
  };
}

export function startScheduler(ctx: PipelineContext): ScheduledTask {
  const expression = toCronExpression(ctx.config.scraping.schedule);
  const timezone = ctx.config.env.timezone;
  const runGuarded = createGuardedRunner(ctx);

  logger.info("Starting scheduler...");

  const task = cron.schedule(
    expression,
    async () => {
      logger.info("[CRON] Starting scheduled scrape...");
      try {
        const result = await runGuarded("scheduled");
        if (!result) return;
        logger.info(
          `[CRON] Scrape complete: ${result.postingsNew} new, ${result.alertsSent} alerts, ${result.errors.length} errors`,
        );
      } catch (error) {
        logger.error(`[CRON] Scheduled scrape failed: ${errorMessage(error)}`);
      }
    },
    { timezone },
  );

  logger.info(`  ✓ Scrape: "${expression}" (${timezone})`);
  return task;
}
