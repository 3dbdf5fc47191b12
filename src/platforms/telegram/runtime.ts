import type TelegramBot from 'node-telegram-bot-api';
import { logger } from '../../middleware/logger.js';
import type { ChannelWatcher, InboundPost } from '../../core/channel-watcher.js';
import type { NotificationSender } from '../../core/notification-sender.js';
import type { CommandHandler } from '../../features/commands.js';
import type { PlatformRuntime } from '../types.js';

export interface TelegramRuntimeDeps {
  bot: TelegramBot;
  watcher: ChannelWatcher;
  sender: NotificationSender;
  commands: CommandHandler;
}

/** Channel posts carry their text either as text or as a media caption */
export function toInboundPost(msg: TelegramBot.Message): InboundPost {
  return {
    channelId: msg.chat.id,
    messageId: msg.message_id,
    text: msg.text ?? msg.caption ?? '',
  };
}

export async function handleChannelPost(watcher: ChannelWatcher, msg: TelegramBot.Message): Promise<void> {
  if (msg.chat.type !== 'channel') return;
  await watcher.ingest(toInboundPost(msg));
}

export async function handlePrivateMessage(
  deps: Pick<TelegramRuntimeDeps, 'sender' | 'commands'>,
  msg: TelegramBot.Message,
): Promise<void> {
  if (msg.chat.type !== 'private' || !msg.text || !msg.from) return;

  const reply = await deps.commands({
    userId: msg.from.id,
    username: msg.from.username ?? null,
    text: msg.text,
  });
  if (reply) await deps.sender.notify(msg.chat.id, reply);
}

export function createTelegramRuntime(deps: TelegramRuntimeDeps): PlatformRuntime {
  const { bot, watcher } = deps;

  bot.on('channel_post', (msg) => {
    handleChannelPost(watcher, msg).catch((err: unknown) => {
      logger.error({ err, chatId: msg.chat.id, messageId: msg.message_id }, 'Channel post handling failed');
    });
  });

  bot.on('message', (msg) => {
    handlePrivateMessage(deps, msg).catch((err: unknown) => {
      logger.error({ err, chatId: msg.chat.id }, 'Private message handling failed');
    });
  });

  bot.on('polling_error', (err) => {
    logger.error({ err }, 'Telegram polling error');
  });

  return {
    platform: 'telegram',

    async start(): Promise<void> {
      const me = await bot.getMe();
      await bot.startPolling();
      logger.info({ botUsername: me.username, botId: me.id }, 'Telegram runtime started');
    },

    async stop(): Promise<void> {
      await bot.stopPolling();
      logger.info('Telegram polling stopped');
    },
  };
}
