/**
 * Row validation shared by the sqlite and postgres stores.
 *
 * Rows come back snake_case; postgres returns BIGINT columns as strings and
 * sqlite stores booleans as 0/1, so every numeric column is coerced here.
 * A mode string outside the closed set fails parsing instead of reaching
 * routing code.
 */

import { z } from 'zod';
import {
  DELIVERY_MODES,
  type Channel,
  type DigestPost,
  type SubscribedChannel,
  type User,
} from './db-types.js';

const numeric = z.coerce.number().int();
const nullableNumeric = z.union([z.null(), z.coerce.number().int()]);
const flag = z.union([z.boolean(), z.number()]).transform((value) => value === true || value === 1);

const deliveryModeSchema = z.enum(DELIVERY_MODES);

const userRow = z.object({
  user_id: numeric,
  username: z.string().nullable(),
  mode: deliveryModeSchema,
  digest_time: z.string(),
  language: z.string(),
  created_at: numeric,
});

const channelRow = z.object({
  id: numeric,
  external_id: nullableNumeric,
  handle: z.string(),
  title: z.string(),
});

const subscribedChannelRow = channelRow.extend({
  subscribed_at: numeric,
});

const countRow = z.object({ count: numeric });

const digestPostRow = z.object({
  id: numeric,
  channel_id: numeric,
  message_id: numeric,
  text: z.string(),
  created_at: numeric,
  sent: flag,
  channel_title: z.string(),
  channel_handle: z.string(),
});

export function toUser(row: unknown): User {
  const r = userRow.parse(row);
  return {
    id: r.user_id,
    username: r.username,
    mode: r.mode,
    digestTime: r.digest_time,
    language: r.language,
    createdAt: r.created_at,
  };
}

export function toChannel(row: unknown): Channel {
  const r = channelRow.parse(row);
  return { id: r.id, externalId: r.external_id, handle: r.handle, title: r.title };
}

export function toSubscribedChannel(row: unknown): SubscribedChannel {
  const r = subscribedChannelRow.parse(row);
  return {
    id: r.id,
    externalId: r.external_id,
    handle: r.handle,
    title: r.title,
    subscribedAt: r.subscribed_at,
  };
}

export function toDigestPost(row: unknown): DigestPost {
  const r = digestPostRow.parse(row);
  return {
    id: r.id,
    channelId: r.channel_id,
    externalMessageId: r.message_id,
    text: r.text,
    createdAt: r.created_at,
    sent: r.sent,
    channelTitle: r.channel_title,
    channelHandle: r.channel_handle,
  };
}

/** COUNT(*) AS count; postgres hands bigint counts back as strings */
export function toCount(row: unknown): number {
  return countRow.parse(row).count;
}

/** Lowercase, trimmed, without the leading @ that users usually type */
export function normalizeHandle(handle: string): string {
  return handle.trim().replace(/^@+/, '').toLowerCase();
}

/** Unix seconds */
export function toUnixSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}
