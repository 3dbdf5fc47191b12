import TelegramBot from 'node-telegram-bot-api';
import { config } from '../utils/config.js';
import type { ChannelTransport } from '../core/transport.js';
import { createTelegramTransport } from './telegram/adapter.js';

export interface TelegramPlatform {
  bot: TelegramBot;
  transport: ChannelTransport;
}

/** Build the bot client and its transport; polling starts with the runtime. */
export function createTelegramPlatform(): TelegramPlatform {
  if (!config.TELEGRAM_BOT_TOKEN) {
    throw new Error('TELEGRAM_BOT_TOKEN is required to run the bot');
  }

  const bot = new TelegramBot(config.TELEGRAM_BOT_TOKEN, { polling: { autoStart: false } });
  return { bot, transport: createTelegramTransport(bot) };
}
