import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS incidents (
    ticket_key TEXT PRIMARY KEY,
    channel_id TEXT NOT NULL,
    thread_ts TEXT NOT NULL,
    author_id TEXT NOT NULL,
    status TEXT NOT NULL,
    assigned_to TEXT,
    created_at TEXT NOT NULL,
    last_notification TEXT,
    UNIQUE(channel_id, thread_ts)
  );

  CREATE INDEX IF NOT EXISTS idx_incidents_status_created
    ON incidents(status, created_at DESC);

  -- One row per (ticket_key, kind): the latest scheduling intent and the due index in one table.
  CREATE TABLE IF NOT EXISTS reminders (
    ticket_key TEXT NOT NULL,
    kind TEXT NOT NULL,
    id TEXT NOT NULL,
    due_at INTEGER NOT NULL,
    interval_minutes INTEGER NOT NULL,
    snapshot_json TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    PRIMARY KEY(ticket_key, kind)
  );

  CREATE INDEX IF NOT EXISTS idx_reminders_due
    ON reminders(due_at, ticket_key, kind);
`;

/** Apply the schema to an open connection. Idempotent. */
export function migrate(db: SqliteDatabase): void {
  db.exec(SCHEMA);
}

/**
 * Open (and create if needed) the threadwatch database.
 * `':memory:'` yields a private in-process database, used by tests.
 */
export function openDatabase(filePath: string): SqliteDatabase {
  if (filePath !== ':memory:') {
    const dir = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(filePath);
  if (filePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  migrate(db);
  return db;
}
