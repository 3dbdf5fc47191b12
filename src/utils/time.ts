/** Wall-clock helpers for the digest schedule. All times are process-local. */

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** "HH:MM" for a Date in local time */
export function formatClock(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

/** Accepts "9:05" or "09:05", returns the zero-padded form or null */
export function parseClock(raw: string): string | null {
  const trimmed = raw.trim();
  const padded = /^\d:\d{2}$/.test(trimmed) ? `0${trimmed}` : trimmed;
  return CLOCK_PATTERN.test(padded) ? padded : null;
}

/** Local calendar date + minute, used to recognise a repeated tick */
export function minuteKey(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day} ${formatClock(date)}`;
}

/** Milliseconds from `date` until the next minute boundary (never 0) */
export function msUntilNextMinute(date: Date): number {
  const elapsed = date.getSeconds() * 1000 + date.getMilliseconds();
  return MINUTE_MS - elapsed;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
