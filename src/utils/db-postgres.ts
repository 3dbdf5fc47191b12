import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { Pool, type PoolConfig } from 'pg';

import { logger } from '../middleware/logger.js';
import { PROJECT_ROOT } from './config.js';
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

/** The slice of pg.Pool the store uses; tests hand in an in-process fake. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export interface PostgresStoreOptions extends StoreOptions {
  pool: PgQueryable;
  /** Applied once before the store is returned */
  schemaSql?: string;
}

export interface PostgresConnectionOptions extends StoreOptions {
  connectionString: string;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
}

const UNIQUE_VIOLATION = '23505';

const USER_INSERT = `INSERT INTO users (user_id, username, mode, digest_time, language, created_at)
  VALUES ($1, $2, $3, $4, $5, $6)`;

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

function resolveSchemaPath(): string | undefined {
  const candidates = [
    resolve(PROJECT_ROOT, 'src', 'utils', 'postgres-schema.sql'),
    resolve(PROJECT_ROOT, 'dist', 'utils', 'postgres-schema.sql'),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }

  return undefined;
}

export async function createPostgresStore(options: PostgresStoreOptions): Promise<SubscriptionStore> {
  const { pool } = options;
  const now = options.now ?? Date.now;
  const defaults = options.userDefaults;

  if (options.schemaSql) {
    await pool.query(options.schemaSql);
  }
  await pool.query('SELECT 1');

  const firstRow = async (text: string, values: unknown[]): Promise<unknown> => {
    const res = await pool.query(text, values);
    const row = res.rows[0];
    if (row === undefined) throw new Error(`Expected a row from: ${text.split('\n')[0]}`);
    return row;
  };

  const upsertUser = (
    userId: number,
    onConflict: string,
    overrides: { username?: string | null; mode?: DeliveryMode; digestTime?: string; language?: string } = {},
  ): Promise<User> =>
    firstRow(
      `${USER_INSERT} ON CONFLICT (user_id) DO UPDATE SET ${onConflict} RETURNING *`,
      [
        userId,
        overrides.username ?? null,
        overrides.mode ?? defaults.mode,
        overrides.digestTime ?? defaults.digestTime,
        overrides.language ?? defaults.language,
        toUnixSeconds(now()),
      ],
    ).then(toUser);

  return {
    getOrCreateUser: async (userId: number, username?: string | null) =>
      upsertUser(userId, 'username = COALESCE(EXCLUDED.username, users.username)', { username }),

    getUser: async (userId: number) => {
      const res = await pool.query('SELECT * FROM users WHERE user_id = $1', [userId]);
      const row = res.rows[0];
      return row === undefined ? undefined : toUser(row);
    },

    setMode: async (userId: number, mode: DeliveryMode) =>
      upsertUser(userId, 'mode = EXCLUDED.mode', { mode }),

    setDigestTime: async (userId: number, digestTime: string) =>
      upsertUser(userId, 'digest_time = EXCLUDED.digest_time', { digestTime }),

    setLanguage: async (userId: number, language: string) =>
      upsertUser(userId, 'language = EXCLUDED.language', { language }),

    usersDueForDigest: async (digestTime: string) => {
      const res = await pool.query(
        `SELECT * FROM users WHERE mode = 'digest' AND digest_time = $1 ORDER BY user_id`,
        [digestTime],
      );
      return res.rows.map(toUser);
    },

    resolveOrCreateChannel: async (handle: string, externalId: number, title: string) =>
      toChannel(await firstRow(
        `INSERT INTO channels (handle, external_id, title) VALUES ($1, $2, $3)
         ON CONFLICT (handle) DO UPDATE SET external_id = EXCLUDED.external_id, title = EXCLUDED.title
         RETURNING *`,
        [normalizeHandle(handle), externalId, title],
      )),

    getChannelByHandle: async (handle: string) => {
      const res = await pool.query('SELECT * FROM channels WHERE handle = $1', [normalizeHandle(handle)]);
      const row = res.rows[0];
      return row === undefined ? undefined : toChannel(row);
    },

    listChannelsByExternalId: async (externalId: number) => {
      const res = await pool.query('SELECT * FROM channels WHERE external_id = $1 ORDER BY id', [externalId]);
      return res.rows.map(toChannel);
    },

    listWatchedChannels: async () => {
      const res = await pool.query(
        `SELECT DISTINCT c.* FROM channels c
         INNER JOIN subscriptions s ON s.channel_id = c.id
         ORDER BY c.id`,
      );
      return res.rows.map(toChannel);
    },

    addSubscription: async (userId: number, channelId: number): Promise<AddSubscriptionOutcome> => {
      try {
        await pool.query(
          'INSERT INTO subscriptions (user_id, channel_id, created_at) VALUES ($1, $2, $3)',
          [userId, channelId, toUnixSeconds(now())],
        );
        return 'added';
      } catch (err) {
        if (isUniqueViolation(err)) return 'already_exists';
        throw err;
      }
    },

    removeSubscription: async (userId: number, channelId: number): Promise<RemoveSubscriptionOutcome> => {
      const res = await pool.query(
        'DELETE FROM subscriptions WHERE user_id = $1 AND channel_id = $2',
        [userId, channelId],
      );
      return (res.rowCount ?? 0) > 0 ? 'removed' : 'not_found';
    },

    hasSubscription: async (userId: number, channelId: number) => {
      const res = await pool.query(
        'SELECT 1 FROM subscriptions WHERE user_id = $1 AND channel_id = $2',
        [userId, channelId],
      );
      return res.rows.length > 0;
    },

    countSubscribers: async (channelId: number) =>
      toCount(await firstRow('SELECT COUNT(*) AS count FROM subscriptions WHERE channel_id = $1', [channelId])),

    countSubscribersByExternalId: async (externalId: number) =>
      toCount(await firstRow(
        `SELECT COUNT(*) AS count FROM subscriptions s
         INNER JOIN channels c ON c.id = s.channel_id
         WHERE c.external_id = $1`,
        [externalId],
      )),

    listSubscribers: async (channelId: number) => {
      const res = await pool.query(
        `SELECT u.* FROM users u
         INNER JOIN subscriptions s ON s.user_id = u.user_id
         WHERE s.channel_id = $1
         ORDER BY s.created_at, u.user_id`,
        [channelId],
      );
      return res.rows.map(toUser);
    },

    listSubscriptions: async (userId: number) => {
      const res = await pool.query(
        `SELECT c.*, s.created_at AS subscribed_at FROM channels c
         INNER JOIN subscriptions s ON s.channel_id = c.id
         WHERE s.user_id = $1
         ORDER BY c.title, c.id`,
        [userId],
      );
      return res.rows.map(toSubscribedChannel);
    },

    recordPost: async (channelId: number, externalMessageId: number, text: string): Promise<RecordPostOutcome> => {
      try {
        await pool.query(
          'INSERT INTO posts (channel_id, message_id, text, created_at, sent) VALUES ($1, $2, $3, $4, FALSE)',
          [channelId, externalMessageId, cutText(text, options.ingestTextLimit), toUnixSeconds(now())],
        );
        return 'recorded';
      } catch (err) {
        if (isUniqueViolation(err)) return 'duplicate_ignored';
        throw err;
      }
    },

    unsentPostsForUser: async (userId: number, lookbackMs: number) => {
      const res = await pool.query(
        `SELECT p.*, c.title AS channel_title, c.handle AS channel_handle
         FROM posts p
         INNER JOIN channels c ON p.channel_id = c.id
         INNER JOIN subscriptions s ON s.channel_id = c.id
         WHERE s.user_id = $1 AND p.created_at > $2 AND p.sent = FALSE
         ORDER BY p.created_at DESC, p.id DESC`,
        [userId, toUnixSeconds(now() - lookbackMs)],
      );
      return res.rows.map(toDigestPost);
    },

    markSent: async (postIds: readonly number[]) => {
      if (postIds.length === 0) return;
      await pool.query('UPDATE posts SET sent = TRUE WHERE id = ANY($1::bigint[])', [Array.from(postIds)]);
    },

    purgeOlderThan: async (retentionMs: number) => {
      const res = await pool.query(
        'DELETE FROM posts WHERE created_at < $1',
        [toUnixSeconds(now() - retentionMs)],
      );
      return res.rowCount ?? 0;
    },

    close: async () => {
      await pool.end();
      logger.info('Postgres pool closed');
    },
  };
}

/** Open a pg pool from connection settings, apply the bundled schema, build the store. */
export async function connectPostgresStore(options: PostgresConnectionOptions): Promise<SubscriptionStore> {
  const poolConfig: PoolConfig = { connectionString: options.connectionString };
  if (options.ssl) {
    poolConfig.ssl = { rejectUnauthorized: options.sslRejectUnauthorized };
  }

  const pool = new Pool(poolConfig);
  const queryable: PgQueryable = {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };

  const schemaPath = resolveSchemaPath();
  let schemaSql: string | undefined;
  if (schemaPath) {
    schemaSql = readFileSync(schemaPath, 'utf-8');
  } else {
    logger.warn('postgres-schema.sql not found in runtime filesystem; relying on existing tables');
  }

  const store = await createPostgresStore({ ...options, pool: queryable, schemaSql });
  logger.info({ postgresSsl: options.ssl }, 'Postgres store initialized');
  return store;
}
