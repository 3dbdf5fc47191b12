/**
 * Structured logger shared by every module.
 *
 * Call shape is pino's: `logger.info({ userId, channelId }, 'Message')`.
 * Pretty output is opt-in (LOG_PRETTY=true) so production keeps JSON lines.
 */

import pino from 'pino';
import { config } from '../utils/config.js';

function isTestRuntime(): boolean {
  return process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);
}

function createLogger(): pino.Logger {
  if (isTestRuntime()) {
    return pino({ level: 'silent' });
  }

  if (config.LOG_PRETTY) {
    return pino({
      level: config.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level: config.LOG_LEVEL });
}

export const logger = createLogger();
