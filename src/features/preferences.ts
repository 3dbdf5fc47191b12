/**
 * Per-user delivery preferences, validated before they reach the store.
 */

import { z } from 'zod';
import { DELIVERY_MODES, type SubscriptionStore, type User } from '../utils/db.js';
import { logger } from '../middleware/logger.js';
import type { Result } from '../utils/formatting.js';
import { parseClock } from '../utils/time.js';
import type { MessageCatalog } from '../core/message-catalog.js';

const modeInput = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(DELIVERY_MODES));

export async function setMode(
  store: SubscriptionStore,
  userId: number,
  raw: string,
): Promise<Result<User, 'invalid_mode'>> {
  const parsed = modeInput.safeParse(raw);
  if (!parsed.success) return { ok: false, error: 'invalid_mode' };

  const user = await store.setMode(userId, parsed.data);
  logger.info({ userId, mode: user.mode }, 'Delivery mode changed');
  return { ok: true, value: user };
}

export async function setDigestTime(
  store: SubscriptionStore,
  userId: number,
  raw: string,
): Promise<Result<User, 'invalid_time'>> {
  const clock = parseClock(raw);
  if (!clock) return { ok: false, error: 'invalid_time' };

  const user = await store.setDigestTime(userId, clock);
  logger.info({ userId, digestTime: user.digestTime }, 'Digest time changed');
  return { ok: true, value: user };
}

export async function setLanguage(
  store: SubscriptionStore,
  catalog: MessageCatalog,
  userId: number,
  raw: string,
): Promise<Result<User, 'invalid_language'>> {
  const language = raw.trim().toLowerCase();
  if (!catalog.hasLanguage(language)) return { ok: false, error: 'invalid_language' };

  const user = await store.setLanguage(userId, language);
  logger.info({ userId, language }, 'Language changed');
  return { ok: true, value: user };
}
