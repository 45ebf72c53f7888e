import { logger } from "./logger";
import { PageFetcher } from "./connectors/fetcher";
import { resolveExtractor, type ExtractorResolver } from "./connectors/extractors";
import { explainRejection } from "./filter";
import { Notifier, createAlertChannel } from "./alerts";
import { PostingStore } from "./db/operations";
import { StoreUnavailableError, errorMessage } from "./errors";
import type { AppConfig, Target } from "./config";
import type { FetchResult, NotifyResult, PipelineRunResult, TargetRunStats } from "./types";

export interface PipelineContext {
  config: AppConfig;
  store: PostingStore;
  fetcher: { fetch(url: string): Promise<FetchResult> };
  notifier: { notify(cap: number): Promise<NotifyResult> };
  resolveExtractor: ExtractorResolver;
}

export interface RunPipelineOptions {
  runType?: string;
}

/** Wires the default components from configuration. */
export function createPipelineContext(
  config: AppConfig,
  store: PostingStore,
): PipelineContext {
  const fetcher = new PageFetcher({
    userAgent: config.scraping.userAgent,
    maxRetries: config.scraping.maxRetries,
    delayMs: config.scraping.requestDelaySeconds * 1000,
    timeoutMs: config.scraping.timeoutSeconds * 1000,
  });

  const notifier = new Notifier(store, createAlertChannel(config), {
    minSendIntervalMs: config.notifications.minSendIntervalMs,
  });

  return { config, store, fetcher, notifier, resolveExtractor };
}

function emptyTargetStats(target: Target): TargetRunStats {
  return {
    target: target.name,
    success: false,
    candidatesFound: 0,
    postingsNew: 0,
    postingsDuplicate: 0,
    postingsRejected: 0,
    postingsKnown: 0,
  };
}

/**
 * Fetch → extract → filter → store for one target. Failures are reported in
 * the returned stats, never thrown.
 */
export async function processTarget(
  ctx: PipelineContext,
  target: Target,
  knownUrls: Set<string>,
): Promise<TargetRunStats> {
  const stats = emptyTargetStats(target);

  logger.info(`--- Scraping target: ${target.name} (${target.url}) ---`);

  try {
    const fetched = await ctx.fetcher.fetch(target.url);
    if (!fetched.success || fetched.html === null) {
      stats.error = `fetch failed: ${fetched.error ?? "no content"}`;
      logger.error(`Could not fetch page for ${target.name}. Skipping.`);
      return stats;
    }

    const extractor = ctx.resolveExtractor(target);
    const candidates = extractor.extract(fetched.html, target.url);
    stats.candidatesFound = candidates.length;

    logger.info(
      `Parsed ${candidates.length} candidates from ${target.name} (${extractor.name}). Filtering...`,
    );

    for (const candidate of candidates) {
      // Cheap pre-check only; the store's unique index decides
      if (knownUrls.has(candidate.url)) {
        stats.postingsKnown++;
        continue;
      }

      const rejection = explainRejection(candidate, ctx.config.preferences);
      if (rejection) {
        stats.postingsRejected++;
        logger.debug(`Filtered out (${rejection}): ${candidate.title}`);
        continue;
      }

      const result = ctx.store.insertIfAbsent({
        company: target.name,
        title: candidate.title,
        url: candidate.url,
        location: candidate.location,
        description: candidate.description,
        postedAt: candidate.postedAt,
      });

      knownUrls.add(candidate.url);
      if (result.status === "created") {
        stats.postingsNew++;
      } else {
        stats.postingsDuplicate++;
      }
    }

    stats.success = true;
    logger.info(`Added ${stats.postingsNew} new postings for ${target.name}.`);
  } catch (error) {
    stats.error = errorMessage(error);
    logger.error(`Error processing ${target.name}:`, error);
  }

  return stats;
}

/**
 * One Notifier pass under the configured cap. Returns null without touching
 * the channel when notifications are disabled.
 */
export async function sendPendingAlerts(
  ctx: Pick<PipelineContext, "config" | "notifier">,
): Promise<NotifyResult | null> {
  const { notifications } = ctx.config;
  if (!notifications.enabled) {
    logger.info("Notifications are disabled. Skipping alert step.");
    return null;
  }
  return ctx.notifier.notify(notifications.maxAlertsPerRun);
}

export async function runPipeline(
  ctx: PipelineContext,
  options: RunPipelineOptions = {},
): Promise<PipelineRunResult> {
  const startTime = Date.now();
  const runType = options.runType ?? "scheduled";
  const { config, store } = ctx;

  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Pipeline Run: ${runType}`);
  logger.info("═══════════════════════════════════════════════════");

  if (!store.isHealthy()) {
    throw new StoreUnavailableError("Posting store failed its health check");
  }

  const runId = store.createRun(runType, config.env.dryRun);
  logger.info(`Run ID: ${runId}`);

  const errors: string[] = [];
  let targetsSucceeded = 0;
  let candidatesFound = 0;
  let postingsNew = 0;
  let postingsDuplicate = 0;
  let postingsRejected = 0;
  let postingsKnown = 0;
  let alertsSent = 0;

  let knownUrls: Set<string>;
  try {
    knownUrls = store.knownUrls();
  } catch (error) {
    const errMsg = `Could not load known URLs: ${errorMessage(error)}`;
    store.finishRun(runId, "failed", {
      targetsAttempted: 0,
      targetsSucceeded: 0,
      candidatesFound: 0,
      postingsNew: 0,
      alertsSent: 0,
      errors: [errMsg],
    });
    throw new StoreUnavailableError(errMsg);
  }
  logger.info(`Loaded ${knownUrls.size} known posting URLs`);

  if (config.targets.length === 0) {
    logger.warn("No targets configured. Nothing to scrape.");
  }

  for (const target of config.targets) {
    const stats = await processTarget(ctx, target, knownUrls);

    candidatesFound += stats.candidatesFound;
    postingsNew += stats.postingsNew;
    postingsDuplicate += stats.postingsDuplicate;
    postingsRejected += stats.postingsRejected;
    postingsKnown += stats.postingsKnown;

    if (stats.success) {
      targetsSucceeded++;
    } else {
      errors.push(`${target.name}: ${stats.error ?? "unknown error"}`);
    }
  }

  logger.info("Scraping finished. Sending alerts...");
  try {
    const result = await sendPendingAlerts(ctx);
    if (result) {
      alertsSent = result.delivered;
      if (result.aborted) {
        errors.push(`notifier: aborted after ${result.delivered} alerts`);
      }
    }
  } catch (error) {
    // Only reachable before the first send; later failures come back as counts
    const errMsg = `notifier: ${errorMessage(error)}`;
    logger.error(`Alert dispatch failed: ${errorMessage(error)}`);
    errors.push(errMsg);
  }

  const targetsAttempted = config.targets.length;
  store.finishRun(runId, "completed", {
    targetsAttempted,
    targetsSucceeded,
    candidatesFound,
    postingsNew,
    alertsSent,
    errors,
  });

  const durationMs = Date.now() - startTime;

  logger.info("Summary");
  logger.info(`  Candidates found: ${candidatesFound}`);
  logger.info(`  Already known: ${postingsKnown}`);
  logger.info(`  Rejected by preferences: ${postingsRejected}`);
  logger.info(`  New postings: ${postingsNew}`);
  logger.info(`  Duplicates: ${postingsDuplicate}`);
  logger.info(`  Alerts sent: ${alertsSent}`);
  logger.info(`  Targets: ${targetsSucceeded}/${targetsAttempted} succeeded`);
  logger.info(`  Errors: ${errors.length}`);
  logger.info(`  Duration: ${(durationMs / 1000).toFixed(1)}s`);
  logger.info("═══════════════════════════════════════════════════");

  return {
    runId,
    targetsAttempted,
    targetsSucceeded,
    candidatesFound,
    postingsNew,
    postingsDuplicate,
    postingsRejected,
    postingsKnown,
    alertsSent,
    errors,
    durationMs,
  };
}
