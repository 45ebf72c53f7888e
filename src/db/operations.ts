import Database from "better-sqlite3";
import { logger } from "../logger";
import { quickHealthCheck, type SqliteDatabase } from "./index";
import type {
  InsertResult,
  NewPosting,
  Posting,
  PostingView,
  RunRecord,
  RunStatus,
  StatusUpdate,
} from "../types";

interface PostingRow {
  id: number;
  url: string;
  company: string;
  title: string;
  location: string | null;
  description: string | null;
  posted_at: string | null;
  scraped_at: string;
  is_notified: number;
  is_applied: number;
  is_ignored: number;
}

interface RunRow {
  id: number;
  run_type: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  targets_attempted: number;
  targets_succeeded: number;
  candidates_found: number;
  postings_new: number;
  alerts_sent: number;
  errors: string | null;
  dry_run: number;
}

export interface RunStats {
  targetsAttempted: number;
  targetsSucceeded: number;
  candidatesFound: number;
  postingsNew: number;
  alertsSent: number;
  errors: string[];
}

export interface StoreStats {
  total: number;
  active: number;
  notified: number;
  pendingAlerts: number;
  applied: number;
  ignored: number;
  runs: number;
  notificationsSent: number;
  notificationsFailed: number;
}

export interface PostingStoreOptions {
  now?: () => Date;
}

const POSTING_COLUMNS = `id, url, company, title, location, description, posted_at,
  scraped_at, is_notified, is_applied, is_ignored`;

function toPosting(row: PostingRow): Posting {
  return {
    id: row.id,
    url: row.url,
    company: row.company,
    title: row.title,
    location: row.location,
    description: row.description,
    postedAt: row.posted_at,
    scrapedAt: row.scraped_at,
    notified: row.is_notified === 1,
    applied: row.is_applied === 1,
    ignored: row.is_ignored === 1,
  };
}

function parseErrors(raw: string | null): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.map(String) : [String(parsed)];
}

function toRunRecord(row: RunRow): RunRecord {
  return {
    id: row.id,
    runType: row.run_type,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    status: row.status,
    targetsAttempted: row.targets_attempted,
    targetsSucceeded: row.targets_succeeded,
    candidatesFound: row.candidates_found,
    postingsNew: row.postings_new,
    alertsSent: row.alerts_sent,
    errors: parseErrors(row.errors),
    dryRun: row.dry_run === 1,
  };
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === "SQLITE_CONSTRAINT_UNIQUE" ||
      error.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

/**
 * Durable posting table keyed by URL. The UNIQUE index on `url` is the dedupe
 * authority; callers may pre-check against `knownUrls()` but never rely on it.
 */
export class PostingStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: SqliteDatabase,
    options: PostingStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  isHealthy(): boolean {
    return quickHealthCheck(this.db);
  }

  // Postings

  knownUrls(): Set<string> {
    const rows = this.db
      .prepare<[], { url: string }>("SELECT url FROM postings")
      .all();
    return new Set(rows.map((r) => r.url));
  }

  protected findIdByUrl(url: string): number | null {
    const row = this.db
      .prepare<[string], { id: number }>(
        "SELECT id FROM postings WHERE url = ?",
      )
      .get(url);
    return row?.id ?? null;
  }

  insertIfAbsent(posting: NewPosting): InsertResult {
    if (this.findIdByUrl(posting.url) !== null) {
      logger.debug(`Posting already stored (URL: ${posting.url})`);
      return { status: "duplicate" };
    }

    try {
      const result = this.db
        .prepare(
          `INSERT INTO postings (
            url, company, title, location, description, posted_at, scraped_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          posting.url,
          posting.company,
          posting.title,
          posting.location,
          posting.description,
          posting.postedAt,
          this.now().toISOString(),
        );

      const created = this.getPosting(Number(result.lastInsertRowid));
      if (!created) {
        throw new Error(`Inserted posting ${result.lastInsertRowid} vanished`);
      }

      logger.info(`Added new posting: ${created.company} - ${created.title}`);
      return { status: "created", posting: created };
    } catch (error) {
      // Another writer stored the same URL between our check and insert
      if (isUniqueViolation(error)) {
        logger.debug(`Posting already stored (unique index): ${posting.url}`);
        return { status: "duplicate" };
      }
      throw error;
    }
  }

  getPosting(id: number): Posting | null {
    const row = this.db
      .prepare<[number], PostingRow>(
        `SELECT ${POSTING_COLUMNS} FROM postings WHERE id = ?`,
      )
      .get(id);
    return row ? toPosting(row) : null;
  }

  selectUnnotifiedAcceptable(): Posting[] {
    return this.db
      .prepare<[], PostingRow>(
        `SELECT ${POSTING_COLUMNS}
         FROM postings
         WHERE is_notified = 0 AND is_ignored = 0 AND is_applied = 0
         ORDER BY scraped_at DESC, id DESC`,
      )
      .all()
      .map(toPosting);
  }

  selectByStatus(view: PostingView = "active"): Posting[] {
    const where =
      view === "applied"
        ? "is_applied = 1"
        : view === "ignored"
          ? "is_ignored = 1"
          : "is_applied = 0 AND is_ignored = 0";

    return this.db
      .prepare<[], PostingRow>(
        `SELECT ${POSTING_COLUMNS}
         FROM postings
         WHERE ${where}
         ORDER BY scraped_at DESC, id DESC`,
      )
      .all()
      .map(toPosting);
  }

  markNotified(id: number): boolean {
    const result = this.db
      .prepare("UPDATE postings SET is_notified = 1 WHERE id = ?")
      .run(id);

    if (result.changes === 0) {
      logger.warn(`Could not mark posting as notified: ID ${id} not found`);
      return false;
    }
    logger.debug(`Marked posting ID ${id} as notified`);
    return true;
  }

  /**
   * Applies status flags in order (applied, then ignored). Setting either flag
   * to true clears the other; setting one to false leaves the other alone.
   */
  updateStatus(id: number, update: StatusUpdate): boolean {
    if (update.applied === undefined && update.ignored === undefined) {
      logger.warn(`No status change provided for posting ID ${id}`);
      return false;
    }

    const current = this.getPosting(id);
    if (!current) {
      logger.warn(`Could not update status: posting ID ${id} not found`);
      return false;
    }

    let applied = current.applied;
    let ignored = current.ignored;

    if (update.applied !== undefined) {
      applied = update.applied;
      if (applied) ignored = false;
    }
    if (update.ignored !== undefined) {
      ignored = update.ignored;
      if (ignored) applied = false;
    }

    this.db
      .prepare("UPDATE postings SET is_applied = ?, is_ignored = ? WHERE id = ?")
      .run(applied ? 1 : 0, ignored ? 1 : 0, id);

    logger.info(
      `Posting ID ${id} status: applied=${applied}, ignored=${ignored}`,
    );
    return true;
  }

  // Run Log

  createRun(runType: string, dryRun: boolean): number {
    const result = this.db
      .prepare(
        "INSERT INTO run_log (run_type, started_at, dry_run) VALUES (?, ?, ?)",
      )
      .run(runType, this.now().toISOString(), dryRun ? 1 : 0);
    return Number(result.lastInsertRowid);
  }

  finishRun(runId: number, status: RunStatus, stats: RunStats): void {
    this.db
      .prepare(
        `UPDATE run_log SET
          finished_at = ?,
          status = ?,
          targets_attempted = ?,
          targets_succeeded = ?,
          candidates_found = ?,
          postings_new = ?,
          alerts_sent = ?,
          errors = ?
        WHERE id = ?`,
      )
      .run(
        this.now().toISOString(),
        status,
        stats.targetsAttempted,
        stats.targetsSucceeded,
        stats.candidatesFound,
        stats.postingsNew,
        stats.alertsSent,
        stats.errors.length > 0 ? JSON.stringify(stats.errors) : null,
        runId,
      );
  }

  lastRun(): RunRecord | null {
    const row = this.db
      .prepare<[], RunRow>(
        `SELECT id, run_type, started_at, finished_at, status,
                targets_attempted, targets_succeeded, candidates_found,
                postings_new, alerts_sent, errors, dry_run
         FROM run_log ORDER BY id DESC LIMIT 1`,
      )
      .get();
    return row ? toRunRecord(row) : null;
  }

  // Notifications

  logNotification(
    postingId: number | null,
    channel: string,
    messageText: string,
    success: boolean,
    errorMessage: string | null,
  ): void {
    this.db
      .prepare(
        `INSERT INTO notifications (posting_id, channel, message_text, success, error_message, sent_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        postingId,
        channel,
        messageText,
        success ? 1 : 0,
        errorMessage,
        this.now().toISOString(),
      );
  }

  stats(): StoreStats {
    const postings = this.db
      .prepare<
        [],
        {
          total: number;
          active: number | null;
          notified: number | null;
          pending: number | null;
          applied: number | null;
          ignored: number | null;
        }
      >(
        `SELECT
           COUNT(*) AS total,
           SUM(CASE WHEN is_applied = 0 AND is_ignored = 0 THEN 1 ELSE 0 END) AS active,
           SUM(is_notified) AS notified,
           SUM(CASE WHEN is_notified = 0 AND is_applied = 0 AND is_ignored = 0 THEN 1 ELSE 0 END) AS pending,
           SUM(is_applied) AS applied,
           SUM(is_ignored) AS ignored
         FROM postings`,
      )
      .get();

    const runs = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM run_log")
      .get();

    const notifications = this.db
      .prepare<[], { sent: number | null; failed: number | null }>(
        `SELECT SUM(success) AS sent, SUM(1 - success) AS failed FROM notifications`,
      )
      .get();

    return {
      total: postings?.total ?? 0,
      active: postings?.active ?? 0,
      notified: postings?.notified ?? 0,
      pendingAlerts: postings?.pending ?? 0,
      applied: postings?.applied ?? 0,
      ignored: postings?.ignored ?? 0,
      runs: runs?.count ?? 0,
      notificationsSent: notifications?.sent ?? 0,
      notificationsFailed: notifications?.failed ?? 0,
    };
  }
}
