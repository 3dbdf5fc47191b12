import type TelegramBot from 'node-telegram-bot-api';
import { z } from 'zod';
import { logger } from '../../middleware/logger.js';
import type {
  ChannelTransport,
  ExternalMessageRef,
  ResolveOutcome,
  SendOutcome,
} from '../../core/transport.js';

/** Bot API message size limit */
export const MAX_MESSAGE_LENGTH = 4096;

/** The slice of TelegramBot the transport calls; tests hand in a fake. */
export interface TelegramBotApi {
  getChat(chatId: string | number): Promise<{ id: number; type: string; title?: string }>;
  sendMessage(chatId: number, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
  forwardMessage(chatId: number, fromChatId: number, messageId: number): Promise<unknown>;
}

const apiErrorSchema = z.object({
  response: z.object({
    body: z.object({
      error_code: z.number(),
      description: z.string().optional(),
      parameters: z.object({ retry_after: z.number().optional() }).optional(),
    }),
  }),
});

export type TelegramFailure =
  | { kind: 'rate_limited'; retryAfterSeconds: number }
  | { kind: 'api'; code: number; description: string }
  | { kind: 'network'; message: string };

/** Classify a rejection from node-telegram-bot-api */
export function classifyTelegramError(err: unknown): TelegramFailure {
  const parsed = apiErrorSchema.safeParse(err);
  if (!parsed.success) {
    return { kind: 'network', message: err instanceof Error ? err.message : String(err) };
  }

  const body = parsed.data.response.body;
  if (body.error_code === 429) {
    return { kind: 'rate_limited', retryAfterSeconds: body.parameters?.retry_after ?? 1 };
  }
  return { kind: 'api', code: body.error_code, description: body.description ?? 'unknown error' };
}

/** Split at newlines (or spaces) so each part fits one message */
export function splitMessage(text: string, limit: number = MAX_MESSAGE_LENGTH): string[] {
  const segments: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= limit) {
      segments.push(remaining);
      break;
    }

    let splitIdx = remaining.lastIndexOf('\n', limit);
    if (splitIdx === -1 || splitIdx < limit / 2) {
      splitIdx = remaining.lastIndexOf(' ', limit);
    }
    if (splitIdx === -1 || splitIdx < limit / 2) {
      splitIdx = limit;
    }

    segments.push(remaining.slice(0, splitIdx));
    remaining = remaining.slice(splitIdx).trimStart();
  }

  return segments;
}

function toSendOutcome(err: unknown): SendOutcome {
  const failure = classifyTelegramError(err);
  switch (failure.kind) {
    case 'rate_limited':
      return { status: 'rate_limited', retryAfterSeconds: failure.retryAfterSeconds };
    case 'api':
      return { status: 'failed', error: `${failure.code}: ${failure.description}` };
    case 'network':
      return { status: 'failed', error: failure.message };
  }
}

export function createTelegramTransport(bot: TelegramBotApi): ChannelTransport {
  return {
    platform: 'telegram',

    async resolveChannel(handle): Promise<ResolveOutcome> {
      try {
        const chat = await bot.getChat(`@${handle}`);
        if (chat.type !== 'channel') {
          logger.debug({ handle, type: chat.type }, 'Handle is not a channel');
          return { status: 'not_found' };
        }
        return { status: 'found', channel: { externalId: chat.id, title: chat.title ?? handle } };
      } catch (err) {
        const failure = classifyTelegramError(err);
        if (failure.kind === 'rate_limited') {
          return { status: 'rate_limited', retryAfterSeconds: failure.retryAfterSeconds };
        }
        if (failure.kind === 'api' && failure.code === 403) return { status: 'private' };
        if (failure.kind === 'api' && failure.code === 400) return { status: 'not_found' };
        throw err;
      }
    },

    async notify(userId, text): Promise<SendOutcome> {
      try {
        for (const segment of splitMessage(text)) {
          await bot.sendMessage(userId, segment, {
            parse_mode: 'HTML',
            disable_web_page_preview: true,
          });
        }
        return { status: 'ok' };
      } catch (err) {
        return toSendOutcome(err);
      }
    },

    async forward(userId, ref: ExternalMessageRef): Promise<SendOutcome> {
      try {
        await bot.forwardMessage(userId, ref.channelId, ref.messageId);
        return { status: 'ok' };
      } catch (err) {
        return toSendOutcome(err);
      }
    },
  };
}
