/**
 * SQLite handle creation and schema.
 *
 * This module owns the CREATE TABLE statements; db-sqlite.ts prepares its
 * statements against the handle returned here.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';

export type SqliteHandle = InstanceType<typeof Database>;

const IN_MEMORY = ':memory:';

/** Open (or create) the database file and apply pragmas + schema. */
export function openSqliteDatabase(path: string): SqliteHandle {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: SqliteHandle = new Database(path, { timeout: 5000 });

  // NOTE: busy_timeout should be set before attempting journal_mode switches.
  db.pragma('busy_timeout = 5000');
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  applySchema(db);
  logger.info({ path }, 'SQLite database opened');
  return db;
}

// ── Schema ──────────────────────────────────────────────────────────

function applySchema(db: SqliteHandle): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      user_id INTEGER PRIMARY KEY,
      username TEXT,
      mode TEXT NOT NULL DEFAULT 'realtime'
        CHECK (mode IN ('realtime', 'digest', 'off')),
      digest_time TEXT NOT NULL DEFAULT '09:00',
      language TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_users_digest
      ON users (mode, digest_time);

    CREATE TABLE IF NOT EXISTS channels (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      handle TEXT NOT NULL UNIQUE,
      external_id INTEGER,
      title TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_channels_external
      ON channels (external_id);

    CREATE TABLE IF NOT EXISTS subscriptions (
      user_id INTEGER NOT NULL REFERENCES users (user_id),
      channel_id INTEGER NOT NULL REFERENCES channels (id),
      created_at INTEGER NOT NULL,
      PRIMARY KEY (user_id, channel_id)
    );

    CREATE INDEX IF NOT EXISTS idx_subscriptions_channel
      ON subscriptions (channel_id);

    CREATE TABLE IF NOT EXISTS posts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      channel_id INTEGER NOT NULL REFERENCES channels (id),
      message_id INTEGER NOT NULL,
      text TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      sent INTEGER NOT NULL DEFAULT 0,
      UNIQUE (channel_id, message_id)
    );

    CREATE INDEX IF NOT EXISTS idx_posts_created
      ON posts (created_at);

    CREATE INDEX IF NOT EXISTS idx_posts_channel_sent
      ON posts (channel_id, sent);
  `);
}

/**
 * True for the unique / primary-key violations the store converts into
 * typed outcomes. Foreign-key and check failures are not included.
 */
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}
