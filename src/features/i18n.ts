/**
 * Message catalog — per-language templates loaded from locales/*.json.
 *
 * Templates use `{name}` placeholders. Lookup falls back to the default
 * language, then to the key itself, so a missing translation degrades to
 * another language instead of an empty message.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { PROJECT_ROOT } from '../utils/config.js';
import { escapeHtml } from '../utils/formatting.js';
import { logger } from '../middleware/logger.js';
import {
  MESSAGE_KEYS,
  type MessageCatalog,
  type MessageKey,
  type MessageValues,
} from '../core/message-catalog.js';

export const SUPPORTED_LANGUAGES = ['uz', 'ru', 'en'] as const;
export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const LOCALES_DIR = resolve(PROJECT_ROOT, 'locales');

export type MessageTable = Partial<Record<MessageKey, string>>;

const localeFileSchema = z.record(z.string(), z.string());
const PLACEHOLDER = /\{(\w+)\}/g;

function isMessageKey(key: string): key is MessageKey {
  return (MESSAGE_KEYS as readonly string[]).includes(key);
}

function fill(template: string, values: MessageValues | undefined): string {
  if (!values) return template;
  return template.replace(PLACEHOLDER, (match, name: string) => {
    const value = values[name];
    return value === undefined ? match : escapeHtml(String(value));
  });
}

export function createMessageCatalog(
  tables: Record<string, MessageTable>,
  defaultLanguage: string,
): MessageCatalog {
  const byLanguage = new Map<string, Map<MessageKey, string>>();
  for (const [language, table] of Object.entries(tables)) {
    const messages = new Map<MessageKey, string>();
    for (const key of MESSAGE_KEYS) {
      const template = table[key];
      if (template !== undefined) messages.set(key, template);
    }
    byLanguage.set(language, messages);
  }

  if (!byLanguage.has(defaultLanguage)) {
    throw new Error(`Default language "${defaultLanguage}" has no message table`);
  }

  const languages = [...byLanguage.keys()];

  return {
    defaultLanguage,
    languages,

    hasLanguage(language) {
      return byLanguage.has(language);
    },

    render(language, key, values) {
      const template =
        byLanguage.get(language)?.get(key) ?? byLanguage.get(defaultLanguage)?.get(key) ?? key;
      return fill(template, values);
    },
  };
}

/** Parse one locale file, keeping only known keys */
export function parseLocaleFile(raw: string, language: string): MessageTable {
  const parsed = localeFileSchema.parse(JSON.parse(raw));
  const table: MessageTable = {};

  for (const [key, template] of Object.entries(parsed)) {
    if (isMessageKey(key)) {
      table[key] = template;
    } else {
      logger.warn({ language, key }, 'Ignoring unknown message key');
    }
  }

  const missing = MESSAGE_KEYS.filter((key) => table[key] === undefined);
  if (missing.length > 0) {
    logger.warn({ language, missing }, 'Locale is missing messages, default language will be used');
  }

  return table;
}

export function loadMessageCatalog(
  defaultLanguage: string,
  languages: readonly string[] = SUPPORTED_LANGUAGES,
  dir: string = LOCALES_DIR,
): MessageCatalog {
  const tables: Record<string, MessageTable> = {};
  for (const language of languages) {
    const raw = readFileSync(resolve(dir, `${language}.json`), 'utf-8');
    tables[language] = parseLocaleFile(raw, language);
  }

  logger.info({ languages, defaultLanguage }, 'Message catalog loaded');
  return createMessageCatalog(tables, defaultLanguage);
}
