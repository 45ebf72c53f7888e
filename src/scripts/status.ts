/**
 * Print posting counts, alert backlog and the most recent run.
 */

import { logger } from "../logger";
import { openDatabase } from "../db";
import { PostingStore } from "../db/operations";
import { loadConfig } from "../config";
import { errorMessage } from "../errors";

try {
  const config = loadConfig();
  const db = openDatabase(config.env.databasePath);
  const store = new PostingStore(db);

  logger.info("═══════════════════════════════════════════════════");
  logger.info("  System Status");
  logger.info("═══════════════════════════════════════════════════");

  const stats = store.stats();
  logger.info(`📊 Total postings: ${stats.total} (${stats.active} active)`);
  logger.info(`📬 Pending alerts: ${stats.pendingAlerts}`);
  logger.info(`📋 Applied: ${stats.applied}, Ignored: ${stats.ignored}`);
  logger.info(
    `📝 Notifications: ${stats.notificationsSent} sent, ${stats.notificationsFailed} failed`,
  );

  const lastRun = store.lastRun();
  if (lastRun) {
    logger.info(`🕐 Last run:`);
    logger.info(`   Type: ${lastRun.runType}`);
    logger.info(`   Started: ${lastRun.startedAt}`);
    logger.info(`   Finished: ${lastRun.finishedAt ?? "still running"}`);
    logger.info(`   Status: ${lastRun.status}`);
    logger.info(
      `   Targets: ${lastRun.targetsSucceeded}/${lastRun.targetsAttempted}, New: ${lastRun.postingsNew}, Alerts: ${lastRun.alertsSent}`,
    );
    for (const err of lastRun.errors) {
      logger.info(`   ⚠ ${err}`);
    }
  } else {
    logger.info("🕐 No runs recorded yet");
  }

  logger.info(`⚙️  Environment: ${config.env.nodeEnv}`);
  logger.info(`🧪 Dry run: ${config.env.dryRun}`);

  db.close();
} catch (error) {
  logger.error(`Status failed: ${errorMessage(error)}`);
  process.exit(1);
}
