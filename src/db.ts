import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { getConfig } from './config.js';

let db: BetterSqlite3.Database | null = null;

// Opened on first use so that importing a module never reads configuration.
// Defaults to an in-memory database: the cache and run history are for the
// operator's current session and are gone after a restart.
export function getDb(): BetterSqlite3.Database {
  if (!db) {
    db = new Database(getConfig().dbPath);
    db.pragma('journal_mode = WAL');
    createSchema(db);
  }
  return db;
}

function createSchema(database: BetterSqlite3.Database): void {
  // Latest generated artifacts, kept for display and download.
  // key is the channel for social posts and 'latest' for everything else.
  database.exec(`
    CREATE TABLE IF NOT EXISTS artifacts (
      kind TEXT NOT NULL CHECK(kind IN ('blog_post', 'weekly_plan', 'social_post')),
      key TEXT NOT NULL,
      title TEXT,
      content TEXT NOT NULL,
      failed INTEGER NOT NULL DEFAULT 0,
      position INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (kind, key)
    )
  `);

  // One row per scheduled iteration
  database.exec(`
    CREATE TABLE IF NOT EXISTS job_runs (
      id TEXT PRIMARY KEY,
      topic TEXT NOT NULL,
      keywords TEXT NOT NULL,
      title TEXT,
      status TEXT NOT NULL DEFAULT 'running'
        CHECK(status IN ('running', 'published', 'publish_failed', 'generation_failed', 'crashed')),
      error TEXT,
      started_at TEXT NOT NULL,
      finished_at TEXT
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_job_runs_started_at ON job_runs(started_at)
  `);
}

export const generateUUID = (): string => {
  return randomUUID();
};
