/**
 * Telegram HTML formatting helpers + shared utility types.
 *
 * Outbound text is sent with parse_mode=HTML, so anything user- or
 * channel-supplied must pass through `escapeHtml` before it is sent.
 */

// ── Shared utility types ────────────────────────────────────────────

/**
 * Discriminated union for operations that can fail in an expected way.
 * Use this instead of throwing for conditions the caller is meant to handle.
 *
 * @example
 * ```ts
 * function parseTime(raw: string): Result<string, 'invalid_time'> {
 *   if (!HH_MM.test(raw)) return { ok: false, error: 'invalid_time' };
 *   return { ok: true, value: raw };
 * }
 * ```
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

/** Escape the three characters Telegram's HTML parser cares about */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * First `limit` UTF-16 units of `text`, one fewer when the cut would split a
 * surrogate pair.
 */
export function cutText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const last = text.charCodeAt(limit - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit;
  return text.slice(0, end);
}

/** Keep the first `limit` characters and append `...` when anything was cut */
export function ellipsize(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return cutText(text, limit) + '...';
}
