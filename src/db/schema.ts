export const SCHEMA_VERSION = 2;

export const CREATE_TABLES_SQL = `
  -- 1. run_log
  CREATE TABLE IF NOT EXISTS run_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_type TEXT NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT,
    status TEXT NOT NULL DEFAULT 'running',
    targets_attempted INTEGER DEFAULT 0,
    targets_succeeded INTEGER DEFAULT 0,
    candidates_found INTEGER DEFAULT 0,
    postings_new INTEGER DEFAULT 0,
    alerts_sent INTEGER DEFAULT 0,
    errors TEXT,
    dry_run INTEGER DEFAULT 0
  );

  -- 2. postings
  CREATE TABLE IF NOT EXISTS postings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    url TEXT NOT NULL,
    company TEXT NOT NULL,
    title TEXT NOT NULL,
    location TEXT,
    description TEXT,
    posted_at TEXT,
    scraped_at TEXT NOT NULL,
    is_notified INTEGER NOT NULL DEFAULT 0,
    is_applied INTEGER NOT NULL DEFAULT 0,
    is_ignored INTEGER NOT NULL DEFAULT 0
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_postings_url ON postings(url);
  CREATE INDEX IF NOT EXISTS idx_postings_company ON postings(company);
  CREATE INDEX IF NOT EXISTS idx_postings_scraped_at ON postings(scraped_at DESC);
  CREATE INDEX IF NOT EXISTS idx_postings_alertable
    ON postings(is_notified, is_applied, is_ignored);

  -- 3. notifications
  CREATE TABLE IF NOT EXISTS notifications (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    posting_id INTEGER,
    channel TEXT NOT NULL,
    message_text TEXT NOT NULL,
    success INTEGER NOT NULL DEFAULT 1,
    error_message TEXT,
    sent_at TEXT NOT NULL,
    FOREIGN KEY (posting_id) REFERENCES postings(id)
  );

  CREATE INDEX IF NOT EXISTS idx_notifications_posting ON notifications(posting_id);
`;

export const POSTING_GUARDS_SQL = `
  CREATE TRIGGER IF NOT EXISTS trg_postings_scraped_at_immutable
  BEFORE UPDATE OF scraped_at ON postings
  WHEN NEW.scraped_at IS NOT OLD.scraped_at
  BEGIN
    SELECT RAISE(ABORT, 'postings.scraped_at is immutable');
  END;

  CREATE TRIGGER IF NOT EXISTS trg_postings_notified_monotonic
  BEFORE UPDATE OF is_notified ON postings
  WHEN OLD.is_notified = 1 AND NEW.is_notified = 0
  BEGIN
    SELECT RAISE(ABORT, 'postings.is_notified cannot be reset');
  END;
`;
