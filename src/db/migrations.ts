import type BetterSqlite3 from "better-sqlite3";
import { CREATE_TABLES_SQL, POSTING_GUARDS_SQL } from "./schema";
import { logger } from "../logger";

interface Migration {
  id: string;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    id: "0001_init_schema",
    description: "Postings, run log and notification log",
    sql: CREATE_TABLES_SQL,
  },
  {
    id: "0002_posting_guards",
    description: "Triggers keeping scraped_at immutable and is_notified monotonic",
    sql: POSTING_GUARDS_SQL,
  },
];

function ensureMigrationTable(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function isApplied(db: BetterSqlite3.Database, id: string): boolean {
  const row = db
    .prepare<[string], { id: string }>(
      "SELECT id FROM _migrations WHERE id = ? LIMIT 1",
    )
    .get(id);
  return !!row;
}

export function runMigrations(db: BetterSqlite3.Database): number {
  ensureMigrationTable(db);
  let applied = 0;

  for (const migration of MIGRATIONS) {
    if (isApplied(db, migration.id)) {
      continue;
    }

    logger.info(`Applying migration ${migration.id}: ${migration.description}`);
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare(
        "INSERT INTO _migrations (id, description) VALUES (?, ?)",
      ).run(migration.id, migration.description);
    });

    try {
      apply();
      applied++;
      logger.info(`Applied migration ${migration.id}`);
    } catch (error) {
      logger.error(`Migration ${migration.id} failed:`, error);
      throw error;
    }
  }

  return applied;
}
