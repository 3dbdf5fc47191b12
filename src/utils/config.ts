import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const HH_MM = /^([01]\d|2[0-3]):[0-5]\d$/;

const envSchema = z.object({
  // Telegram — required by the bot runtime, not by the core
  TELEGRAM_BOT_TOKEN: z.string().optional(),

  // Storage
  DB_DIALECT: z.enum(['sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().default('data/channelcast.db'),
  DATABASE_URL: z.string().optional(),
  POSTGRES_SSL: booleanFromEnv.default('false'),
  POSTGRES_SSL_REJECT_UNAUTHORIZED: booleanFromEnv.default('true'),

  // User defaults
  DEFAULT_LANGUAGE: z.enum(['uz', 'ru', 'en']).default('uz'),
  DEFAULT_DIGEST_TIME: z.string().regex(HH_MM, 'DEFAULT_DIGEST_TIME must be HH:MM').default('09:00'),

  // Routing and digest tuning
  POST_RETENTION_DAYS: z.coerce.number().int().positive().default(7),
  DIGEST_LOOKBACK_HOURS: z.coerce.number().int().positive().default(24),
  DIGEST_CHANNEL_POST_CAP: z.coerce.number().int().positive().default(5),
  INGEST_TEXT_LIMIT: z.coerce.number().int().positive().default(500),
  DIGEST_TEXT_LIMIT: z.coerce.number().int().positive().default(100),
  REALTIME_SEND_DELAY_MS: z.coerce.number().int().nonnegative().default(100),

  // Infrastructure
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_PRETTY: booleanFromEnv.default('false'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

if (parsed.data.DB_DIALECT === 'postgres' && !parsed.data.DATABASE_URL) {
  console.error('❌ DB_DIALECT=postgres requires DATABASE_URL');
  process.exit(1);
}

export const config = {
  ...parsed.data,
  SQLITE_PATH: resolve(PROJECT_ROOT, parsed.data.SQLITE_PATH),
};
export { PROJECT_ROOT };
