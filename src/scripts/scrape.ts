/**
 * One-shot scrape: fetch every target, store new postings, send alerts.
 * Exits 1 only when the run could not start (bad config, store unreachable).
 */

import { logger } from "../logger";
import { openDatabase } from "../db";
import { PostingStore } from "../db/operations";
import { loadConfig } from "../config";
import { createPipelineContext, runPipeline } from "../pipeline";
import { ConfigError, StoreUnavailableError, errorMessage } from "../errors";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Manual Scrape Triggered");
logger.info("═══════════════════════════════════════════════════");

let exitCode = 0;

try {
  const config = loadConfig();
  const db = openDatabase(config.env.databasePath);

  try {
    const ctx = createPipelineContext(config, new PostingStore(db));
    const result = await runPipeline(ctx, { runType: "manual" });

    if (result.errors.length > 0) {
      logger.warn(`Run ${result.runId} finished with ${result.errors.length} errors:`);
      for (const err of result.errors) {
        logger.warn(`  - ${err}`);
      }
    }
  } finally {
    db.close();
  }
} catch (error) {
  if (error instanceof ConfigError || error instanceof StoreUnavailableError) {
    logger.error(`Scrape aborted: ${error.message}`);
  } else {
    logger.error(`Scrape failed: ${errorMessage(error)}`);
  }
  exitCode = 1;
}

process.exit(exitCode);
