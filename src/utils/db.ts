/**
 * Store entry point — picks the backend named by DB_DIALECT.
 *
 * Callers depend on the `SubscriptionStore` interface only; nothing outside
 * src/utils touches a driver handle.
 */

import { config } from './config.js';
import { logger } from '../middleware/logger.js';
import { createSqliteStore } from './db-sqlite.js';
import { connectPostgresStore } from './db-postgres.js';
import type { StoreOptions, SubscriptionStore } from './db-backend.js';

export type { StoreOptions, SubscriptionStore } from './db-backend.js';
export type {
  AddSubscriptionOutcome,
  Channel,
  DeliveryMode,
  DigestPost,
  Post,
  RecordPostOutcome,
  RemoveSubscriptionOutcome,
  SubscribedChannel,
  User,
} from './db-types.js';
export { DELIVERY_MODES } from './db-types.js';
export { normalizeHandle } from './db-rows.js';

export function storeOptionsFromConfig(): StoreOptions {
  return {
    userDefaults: {
      mode: 'realtime',
      digestTime: config.DEFAULT_DIGEST_TIME,
      language: config.DEFAULT_LANGUAGE,
    },
    ingestTextLimit: config.INGEST_TEXT_LIMIT,
  };
}

export async function openStore(): Promise<SubscriptionStore> {
  const options = storeOptionsFromConfig();

  if (config.DB_DIALECT === 'postgres') {
    if (!config.DATABASE_URL) {
      throw new Error('DB_DIALECT=postgres requires DATABASE_URL');
    }
    return connectPostgresStore({
      ...options,
      connectionString: config.DATABASE_URL,
      ssl: config.POSTGRES_SSL,
      sslRejectUnauthorized: config.POSTGRES_SSL_REJECT_UNAUTHORIZED,
    });
  }

  logger.debug({ path: config.SQLITE_PATH }, 'Opening sqlite store');
  return createSqliteStore({ ...options, path: config.SQLITE_PATH });
}
