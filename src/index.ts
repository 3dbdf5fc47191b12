import { openStore, type SubscriptionStore } from './utils/db.js';
import { createTelegramPlatform } from './platforms/index.js';
import { createTelegramRuntime } from './platforms/telegram/runtime.js';
import type { PlatformRuntime } from './platforms/types.js';
import { logger } from './middleware/logger.js';
import { config } from './utils/config.js';
import { createNotificationSender } from './core/notification-sender.js';
import { createChannelWatcher } from './core/channel-watcher.js';
import { loadMessageCatalog } from './features/i18n.js';
import { createDigestService, digestOptionsFromConfig } from './features/digest.js';
import { createDigestScheduler, type DigestScheduler } from './features/digest-scheduler.js';
import { createCommandHandler } from './features/commands.js';

interface Running {
  runtime: PlatformRuntime;
  scheduler: DigestScheduler;
  store: SubscriptionStore;
}

let running: Running | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  logger.info('📡 Channelcast starting...');

  logger.info({
    dbDialect: config.DB_DIALECT,
    defaultLanguage: config.DEFAULT_LANGUAGE,
    defaultDigestTime: config.DEFAULT_DIGEST_TIME,
    retentionDays: config.POST_RETENTION_DAYS,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  const catalog = loadMessageCatalog(config.DEFAULT_LANGUAGE);
  const { bot, transport } = createTelegramPlatform();
  const store = await openStore();

  const sender = createNotificationSender(transport, { interSendDelayMs: config.REALTIME_SEND_DELAY_MS });
  const watcher = createChannelWatcher({ store, transport, sender, catalog });
  const digest = createDigestService({ store, sender, catalog, options: digestOptionsFromConfig() });
  const scheduler = createDigestScheduler({ store, digest });
  const commands = createCommandHandler({ store, watcher, digest, catalog });
  const runtime = createTelegramRuntime({ bot, watcher, sender, commands });

  running = { runtime, scheduler, store };

  // The watch set must be populated before the first post arrives
  await watcher.start();
  scheduler.start();

  logger.info({ platform: runtime.platform }, 'Starting platform runtime');
  await runtime.start();
  logger.info({ watchedChannels: await watcher.watchedCount() }, '📡 Channelcast is online and listening');
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error — shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection — shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception — shutting down');
  process.exit(1);
});

// Graceful shutdown: stop intake, let the current digest tick finish, then close the store
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Received shutdown signal — shutting down');

  if (running) {
    const { runtime, scheduler, store } = running;

    try {
      await runtime.stop();
    } catch (err) {
      logger.error({ err, signal }, 'Failed to stop polling cleanly');
    }

    await scheduler.stop();

    try {
      await store.close();
    } catch (err) {
      logger.error({ err, signal }, 'Failed to close database cleanly during shutdown');
    }
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
