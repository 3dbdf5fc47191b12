/**
 * Shared registry domain types used by all store backends.
 *
 * Keep this file backend-agnostic so sqlite and postgres implementations
 * can share the exact same API contract.
 */

export const DELIVERY_MODES = ['realtime', 'digest', 'off'] as const;

/** How a subscriber wants new posts delivered */
export type DeliveryMode = (typeof DELIVERY_MODES)[number];

export interface User {
  id: number;
  username: string | null;
  mode: DeliveryMode;
  /** Local wall-clock "HH:MM" */
  digestTime: string;
  language: string;
  createdAt: number;
}

export interface Channel {
  id: number;
  /** Platform-assigned id; null until the handle has been resolved once */
  externalId: number | null;
  /** Lowercase, without a leading @ */
  handle: string;
  title: string;
}

export interface SubscribedChannel extends Channel {
  subscribedAt: number;
}

export interface Post {
  id: number;
  channelId: number;
  externalMessageId: number;
  text: string;
  createdAt: number;
  sent: boolean;
}

/** A pending post joined with its owning channel for digest rendering */
export interface DigestPost extends Post {
  channelTitle: string;
  channelHandle: string;
}

export type AddSubscriptionOutcome = 'added' | 'already_exists';
export type RemoveSubscriptionOutcome = 'removed' | 'not_found';
export type RecordPostOutcome = 'recorded' | 'duplicate_ignored';

/** Defaults applied when a user is created lazily */
export interface UserDefaults {
  mode: DeliveryMode;
  digestTime: string;
  language: string;
}
