/**
 * Slash-command handling for private chats.
 *
 * Returns the reply text (HTML) or null when nothing should be sent back,
 * either because the text is not a command or because the command already
 * delivered its own output (/digest).
 */

import { logger } from '../middleware/logger.js';
import type { DeliveryMode, SubscriptionStore, User } from '../utils/db.js';
import { escapeHtml } from '../utils/formatting.js';
import type { ChannelWatcher } from '../core/channel-watcher.js';
import type { MessageCatalog, MessageKey } from '../core/message-catalog.js';
import type { DigestService } from './digest.js';
import { setDigestTime, setLanguage, setMode } from './preferences.js';

export interface CommandRequest {
  userId: number;
  username?: string | null;
  text: string;
}

export interface ParsedCommand {
  name: string;
  args: string;
}

export type CommandHandler = (request: CommandRequest) => Promise<string | null>;

export interface CommandDeps {
  store: SubscriptionStore;
  watcher: ChannelWatcher;
  digest: DigestService;
  catalog: MessageCatalog;
}

const COMMAND_PATTERN = /^\/([a-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i;
const HANDLE_PATTERN = /^@?[a-z0-9_]{1,64}$/i;
const LINK_PREFIX = /^(?:https?:\/\/)?(?:t\.me|telegram\.me)\//i;

const MODE_LABELS: Record<DeliveryMode, MessageKey> = {
  realtime: 'mode_realtime',
  digest: 'mode_digest',
  off: 'mode_off',
};

/** "/add@channelcast_bot @news" → { name: 'add', args: '@news' } */
export function parseCommand(text: string): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

/** Accepts "@name", "name" or a t.me link; null when it cannot be a channel username */
export function extractHandle(raw: string): string | null {
  const candidate = raw.trim().split(/\s+/)[0]?.replace(LINK_PREFIX, '') ?? '';
  return HANDLE_PATTERN.test(candidate) ? candidate : null;
}

export function createCommandHandler(deps: CommandDeps): CommandHandler {
  const { store, watcher, digest, catalog } = deps;

  function settingsText(user: User): string {
    return catalog.render(user.language, 'settings', {
      mode: catalog.render(user.language, MODE_LABELS[user.mode]),
      time: user.digestTime,
      language: catalog.render(user.language, 'language_name'),
    });
  }

  async function listChannels(user: User): Promise<string> {
    const channels = await store.listSubscriptions(user.id);
    if (channels.length === 0) return catalog.render(user.language, 'no_channels');

    const lines = channels.map((channel) => `• @${escapeHtml(channel.handle)} - ${escapeHtml(channel.title)}`);
    return [catalog.render(user.language, 'your_channels'), '', ...lines].join('\n');
  }

  async function add(user: User, args: string): Promise<string> {
    if (!args) return catalog.render(user.language, 'usage_add');
    const handle = extractHandle(args);
    if (!handle) return catalog.render(user.language, 'invalid_handle');

    const result = await watcher.subscribe(user.id, handle);
    switch (result.status) {
      case 'added':
        return catalog.render(user.language, 'channel_added', { channel: result.title });
      case 'already_added':
        return catalog.render(user.language, 'channel_already_added');
      case 'not_found':
        return catalog.render(user.language, 'channel_not_found');
    }
  }

  async function remove(user: User, args: string): Promise<string> {
    if (!args) return catalog.render(user.language, 'usage_remove');
    const handle = extractHandle(args);
    if (!handle) return catalog.render(user.language, 'invalid_handle');

    const result = await watcher.unsubscribe(user.id, handle);
    if (result.status === 'removed') {
      return catalog.render(user.language, 'channel_removed', { channel: result.title });
    }
    return catalog.render(user.language, 'channel_not_in_list');
  }

  async function dispatch(user: User, command: ParsedCommand): Promise<string | null> {
    const lang = user.language;

    switch (command.name) {
      case 'start':
        return catalog.render(lang, 'start');
      case 'help':
        return catalog.render(lang, 'help');
      case 'add':
        return add(user, command.args);
      case 'remove':
        return remove(user, command.args);
      case 'list':
        return listChannels(user);
      case 'digest':
        await digest.manualDigest(user.id);
        return null;
      case 'settings':
        return settingsText(user);

      case 'mode': {
        const result = await setMode(store, user.id, command.args);
        if (!result.ok) return catalog.render(lang, 'invalid_mode');
        return catalog.render(lang, 'mode_changed', {
          mode: catalog.render(lang, MODE_LABELS[result.value.mode]),
        });
      }

      case 'time': {
        const result = await setDigestTime(store, user.id, command.args);
        if (!result.ok) return catalog.render(lang, 'invalid_time');
        return catalog.render(lang, 'time_changed', { time: result.value.digestTime });
      }

      case 'lang': {
        const result = await setLanguage(store, catalog, user.id, command.args);
        if (!result.ok) {
          return catalog.render(lang, 'invalid_language', { languages: catalog.languages.join(', ') });
        }
        // Confirm in the language just chosen
        const next = result.value.language;
        return catalog.render(next, 'lang_changed', { language: catalog.render(next, 'language_name') });
      }

      default:
        return catalog.render(lang, 'unknown_command');
    }
  }

  return async (request) => {
    const command = parseCommand(request.text);
    if (!command) return null;

    let language = catalog.defaultLanguage;
    try {
      const user = await store.getOrCreateUser(request.userId, request.username ?? null);
      language = user.language;
      logger.debug({ userId: user.id, command: command.name }, 'Command received');
      return await dispatch(user, command);
    } catch (err) {
      logger.error({ err, userId: request.userId, command: command.name }, 'Command failed');
      return catalog.render(language, 'error');
    }
  };
}
