import { serve } from "@hono/node-server";
import type { ScheduledTask } from "node-cron";
import { logger } from "./logger";
import { openDatabase, checkDatabaseIntegrity, type SqliteDatabase } from "./db";
import { PostingStore } from "./db/operations";
import { loadConfig, type AppConfig } from "./config";
import { createPipelineContext } from "./pipeline";
import { startScheduler } from "./scheduler";
import { createDashboardApp } from "./dashboard";
import { errorMessage } from "./errors";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Career Page Crawler");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error(`Failed to load configuration: ${errorMessage(error)}`);
  process.exit(1);
}

let db: SqliteDatabase;
try {
  db = openDatabase(config.env.databasePath);
} catch (error) {
  logger.error("Failed to initialize database:", error);
  process.exit(1);
}

const integrity = checkDatabaseIntegrity(db);
if (!integrity.ok) {
  logger.error(`Database integrity check failed: ${integrity.result}`);
  logger.error(
    `Please restore from backup or delete ${config.env.databasePath} to recreate.`,
  );
  db.close();
  process.exit(1);
}

const store = new PostingStore(db);
const ctx = createPipelineContext(config, store);
const app = createDashboardApp({
  store,
  dryRun: config.env.dryRun,
  telegramBotToken: config.env.telegramBotToken,
});

let task: ScheduledTask;
try {
  task = startScheduler(ctx);
} catch (error) {
  logger.error(`Failed to start scheduler: ${errorMessage(error)}`);
  db.close();
  process.exit(1);
}

const { port, host } = config.env;
logger.info(`Starting server on ${host}:${port}...`);

const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
  logger.info(`✅ Career crawler started on http://${host}:${info.port}`);
  logger.info(`   Dashboard: http://${host}:${info.port}/`);
  logger.info(`   Health:    http://${host}:${info.port}/health`);
  logger.info(`   API:       http://${host}:${info.port}/api/postings`);
  logger.info("═══════════════════════════════════════════════════");
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down...`);
  task.stop();
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
