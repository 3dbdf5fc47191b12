/**
 * SQLite subscription store — users, channels, subscriptions and pending
 * digest posts on a single better-sqlite3 handle.
 *
 * better-sqlite3 is synchronous, so every statement below runs to completion
 * before any other caller gets the event loop. Inserts that can collide are
 * attempted directly and the unique violation is translated.
 */

import { logger } from '../middleware/logger.js';
import { openSqliteDatabase, isUniqueViolation, type SqliteHandle } from './db-schema.js';
import {
  normalizeHandle,
  toChannel,
  toCount,
  toDigestPost,
  toSubscribedChannel,
  toUnixSeconds,
  toUser,
} from './db-rows.js';
import { cutText } from './formatting.js';
import type { StoreOptions, SubscriptionStore } from './db-backend.js';
import type {
  AddSubscriptionOutcome,
  DeliveryMode,
  RecordPostOutcome,
  RemoveSubscriptionOutcome,
  User,
} from './db-types.js';

export interface SqliteStoreOptions extends StoreOptions {
  /** File path, or ':memory:' */
  path: string;
}

const USER_INSERT_COLUMNS = `(user_id, username, mode, digest_time, language, created_at)
  VALUES (@userId, @username, @mode, @digestTime, @language, @createdAt)`;

function prepareStatements(db: SqliteHandle) {
  return {
    upsertUser: db.prepare(
      `INSERT INTO users ${USER_INSERT_COLUMNS}
       ON CONFLICT(user_id) DO UPDATE SET username = COALESCE(excluded.username, users.username)
       RETURNING *`,
    ),
    upsertUserMode: db.prepare(
      `INSERT INTO users ${USER_INSERT_COLUMNS}
       ON CONFLICT(user_id) DO UPDATE SET mode = excluded.mode
       RETURNING *`,
    ),
    upsertUserDigestTime: db.prepare(
      `INSERT INTO users ${USER_INSERT_COLUMNS}
       ON CONFLICT(user_id) DO UPDATE SET digest_time = excluded.digest_time
       RETURNING *`,
    ),
    upsertUserLanguage: db.prepare(
      `INSERT INTO users ${USER_INSERT_COLUMNS}
       ON CONFLICT(user_id) DO UPDATE SET language = excluded.language
       RETURNING *`,
    ),
    selectUser: db.prepare(`SELECT * FROM users WHERE user_id = ?`),
    selectUsersDue: db.prepare(
      `SELECT * FROM users WHERE mode = 'digest' AND digest_time = ? ORDER BY user_id`,
    ),
    upsertChannel: db.prepare(
      `INSERT INTO channels (handle, external_id, title) VALUES (?, ?, ?)
       ON CONFLICT(handle) DO UPDATE SET external_id = excluded.external_id, title = excluded.title
       RETURNING *`,
    ),
    selectChannelByHandle: db.prepare(`SELECT * FROM channels WHERE handle = ?`),
    selectChannelsByExternalId: db.prepare(
      `SELECT * FROM channels WHERE external_id = ? ORDER BY id`,
    ),
    selectWatchedChannels: db.prepare(
      `SELECT DISTINCT c.* FROM channels c
       INNER JOIN subscriptions s ON s.channel_id = c.id
       ORDER BY c.id`,
    ),
    insertSubscription: db.prepare(
      `INSERT INTO subscriptions (user_id, channel_id, created_at) VALUES (?, ?, ?)`,
    ),
    deleteSubscription: db.prepare(
      `DELETE FROM subscriptions WHERE user_id = ? AND channel_id = ?`,
    ),
    selectSubscription: db.prepare(
      `SELECT 1 FROM subscriptions WHERE user_id = ? AND channel_id = ?`,
    ),
    countSubscribers: db.prepare(
      `SELECT COUNT(*) as count FROM subscriptions WHERE channel_id = ?`,
    ),
    countSubscribersByExternalId: db.prepare(
      `SELECT COUNT(*) as count FROM subscriptions s
       INNER JOIN channels c ON c.id = s.channel_id
       WHERE c.external_id = ?`,
    ),
    selectSubscribers: db.prepare(
      `SELECT u.* FROM users u
       INNER JOIN subscriptions s ON s.user_id = u.user_id
       WHERE s.channel_id = ?
       ORDER BY s.created_at, u.user_id`,
    ),
    selectSubscriptions: db.prepare(
      `SELECT c.*, s.created_at as subscribed_at FROM channels c
       INNER JOIN subscriptions s ON s.channel_id = c.id
       WHERE s.user_id = ?
       ORDER BY c.title, c.id`,
    ),
    insertPost: db.prepare(
      `INSERT INTO posts (channel_id, message_id, text, created_at, sent) VALUES (?, ?, ?, ?, 0)`,
    ),
    selectUnsentPosts: db.prepare(
      `SELECT p.*, c.title as channel_title, c.handle as channel_handle
       FROM posts p
       INNER JOIN channels c ON p.channel_id = c.id
       INNER JOIN subscriptions s ON s.channel_id = c.id
       WHERE s.user_id = ? AND p.created_at > ? AND p.sent = 0
       ORDER BY p.created_at DESC, p.id DESC`,
    ),
    markPostSent: db.prepare(`UPDATE posts SET sent = 1 WHERE id = ?`),
    deletePostsBefore: db.prepare(`DELETE FROM posts WHERE created_at < ?`),
  };
}

/** Build a SubscriptionStore on a better-sqlite3 handle. */
export function createSqliteStore(options: SqliteStoreOptions): SubscriptionStore {
  const db = openSqliteDatabase(options.path);
  const statements = prepareStatements(db);
  const now = options.now ?? Date.now;
  const defaults = options.userDefaults;

  const userParams = (userId: number, overrides: Partial<Record<'mode' | 'digestTime' | 'language', string>> = {}) => ({
    userId,
    username: null,
    mode: defaults.mode,
    digestTime: defaults.digestTime,
    language: defaults.language,
    createdAt: toUnixSeconds(now()),
    ...overrides,
  });

  const markAllSent = db.transaction((ids: readonly number[]) => {
    for (const id of ids) statements.markPostSent.run(id);
  });

  return {
    async getOrCreateUser(userId: number, username?: string | null): Promise<User> {
      return toUser(statements.upsertUser.get({ ...userParams(userId), username: username ?? null }));
    },

    async getUser(userId: number) {
      const row = statements.selectUser.get(userId);
      return row === undefined ? undefined : toUser(row);
    },

    async setMode(userId: number, mode: DeliveryMode) {
      return toUser(statements.upsertUserMode.get(userParams(userId, { mode })));
    },

    async setDigestTime(userId: number, digestTime: string) {
      return toUser(statements.upsertUserDigestTime.get(userParams(userId, { digestTime })));
    },

    async setLanguage(userId: number, language: string) {
      return toUser(statements.upsertUserLanguage.get(userParams(userId, { language })));
    },

    async usersDueForDigest(digestTime: string) {
      return statements.selectUsersDue.all(digestTime).map(toUser);
    },

    async resolveOrCreateChannel(handle: string, externalId: number, title: string) {
      return toChannel(statements.upsertChannel.get(normalizeHandle(handle), externalId, title));
    },

    async getChannelByHandle(handle: string) {
      const row = statements.selectChannelByHandle.get(normalizeHandle(handle));
      return row === undefined ? undefined : toChannel(row);
    },

    async listChannelsByExternalId(externalId: number) {
      return statements.selectChannelsByExternalId.all(externalId).map(toChannel);
    },

    async listWatchedChannels() {
      return statements.selectWatchedChannels.all().map(toChannel);
    },

    async addSubscription(userId: number, channelId: number): Promise<AddSubscriptionOutcome> {
      try {
        statements.insertSubscription.run(userId, channelId, toUnixSeconds(now()));
        return 'added';
      } catch (err) {
        if (isUniqueViolation(err)) return 'already_exists';
        throw err;
      }
    },

    async removeSubscription(userId: number, channelId: number): Promise<RemoveSubscriptionOutcome> {
      const result = statements.deleteSubscription.run(userId, channelId);
      return result.changes > 0 ? 'removed' : 'not_found';
    },

    async hasSubscription(userId: number, channelId: number) {
      return statements.selectSubscription.get(userId, channelId) !== undefined;
    },

    async countSubscribers(channelId: number) {
      return toCount(statements.countSubscribers.get(channelId));
    },

    async countSubscribersByExternalId(externalId: number) {
      return toCount(statements.countSubscribersByExternalId.get(externalId));
    },

    async listSubscribers(channelId: number) {
      return statements.selectSubscribers.all(channelId).map(toUser);
    },

    async listSubscriptions(userId: number) {
      return statements.selectSubscriptions.all(userId).map(toSubscribedChannel);
    },

    async recordPost(channelId: number, externalMessageId: number, text: string): Promise<RecordPostOutcome> {
      try {
        statements.insertPost.run(
          channelId,
          externalMessageId,
          cutText(text, options.ingestTextLimit),
          toUnixSeconds(now()),
        );
        return 'recorded';
      } catch (err) {
        if (isUniqueViolation(err)) return 'duplicate_ignored';
        throw err;
      }
    },

    async unsentPostsForUser(userId: number, lookbackMs: number) {
      const cutoff = toUnixSeconds(now() - lookbackMs);
      return statements.selectUnsentPosts.all(userId, cutoff).map(toDigestPost);
    },

    async markSent(postIds: readonly number[]) {
      if (postIds.length === 0) return;
      markAllSent(postIds);
    },

    async purgeOlderThan(retentionMs: number) {
      const cutoff = toUnixSeconds(now() - retentionMs);
      return statements.deletePostsBefore.run(cutoff).changes;
    },

    async close() {
      db.close();
      logger.info({ path: options.path }, 'SQLite database closed');
    },
  };
}
