/**
 * Keys the core and the command layer render through a catalog. The core
 * picks a key and its values; the catalog owns the wording per language.
 */
export const MESSAGE_KEYS = [
  'start',
  'help',
  'error',
  'unknown_command',
  'channel_added',
  'channel_already_added',
  'channel_not_found',
  'channel_removed',
  'channel_not_in_list',
  'usage_add',
  'usage_remove',
  'invalid_handle',
  'no_channels',
  'your_channels',
  'new_post',
  'no_posts',
  'digest_header',
  'digest_channel',
  'digest_more',
  'mode_realtime',
  'mode_digest',
  'mode_off',
  'mode_changed',
  'invalid_mode',
  'time_changed',
  'invalid_time',
  'lang_changed',
  'invalid_language',
  'settings',
  'language_name',
] as const;

export type MessageKey = (typeof MESSAGE_KEYS)[number];

export type MessageValues = Record<string, string | number>;

export interface MessageCatalog {
  readonly defaultLanguage: string;
  readonly languages: readonly string[];
  hasLanguage(language: string): boolean;
  /** Values are HTML-escaped before substitution */
  render(language: string, key: MessageKey, values?: MessageValues): string;
}
