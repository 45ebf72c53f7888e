/**
 * Send pending alerts without scraping, e.g. after fixing channel credentials.
 */

import { logger } from "../logger";
import { openDatabase } from "../db";
import { PostingStore } from "../db/operations";
import { loadConfig } from "../config";
import { createAlertChannel, Notifier } from "../alerts";
import { sendPendingAlerts } from "../pipeline";
import { errorMessage } from "../errors";

let exitCode = 0;

try {
  const config = loadConfig();
  const db = openDatabase(config.env.databasePath);

  try {
    const store = new PostingStore(db);
    const notifier = new Notifier(store, createAlertChannel(config), {
      minSendIntervalMs: config.notifications.minSendIntervalMs,
    });

    const result = await sendPendingAlerts({ config, notifier });
    if (result) {
      logger.info(
        `✅ Notify complete: ${result.delivered} delivered, ${result.failed} failed, ${result.held} held`,
      );
      if (result.aborted) exitCode = 1;
    }
  } finally {
    db.close();
  }
} catch (error) {
  logger.error(`Notify failed: ${errorMessage(error)}`);
  exitCode = 1;
}

process.exit(exitCode);
