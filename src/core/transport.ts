import type { MessagingPlatform } from '../platforms/types.js';

/**
 * Transport API.
 *
 * The minimal surface the core needs from a chat platform. Implementations
 * report every expected failure as a typed outcome instead of throwing, so
 * routing and digest code never see platform-specific SDK errors.
 */
export interface ChannelTransport {
  platform: MessagingPlatform;

  resolveChannel(handle: string): Promise<ResolveOutcome>;

  /** Send a plain (HTML-formatted) notification to a user */
  notify(userId: number, text: string): Promise<SendOutcome>;

  /** Forward an original channel post to a user */
  forward(userId: number, ref: ExternalMessageRef): Promise<SendOutcome>;
}

/** Where a post lives on the platform */
export interface ExternalMessageRef {
  channelId: number;
  messageId: number;
}

export interface ResolvedChannel {
  externalId: number;
  title: string;
}

export type ResolveOutcome =
  | { status: 'found'; channel: ResolvedChannel }
  | { status: 'not_found' }
  | { status: 'private' }
  | { status: 'rate_limited'; retryAfterSeconds: number };

export type SendOutcome =
  | { status: 'ok' }
  | { status: 'rate_limited'; retryAfterSeconds: number }
  | { status: 'failed'; error: string };
