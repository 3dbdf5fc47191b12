/**
 * Digest — batches a user's unsent posts into one message.
 *
 * Posts are grouped by channel in the order the store returns them (newest
 * first), capped per channel, and marked sent only after the message went
 * out. A failed send leaves them for the next attempt.
 */

import { logger } from '../middleware/logger.js';
import { config } from '../utils/config.js';
import type { DigestPost, SubscriptionStore, User } from '../utils/db.js';
import { ellipsize, escapeHtml } from '../utils/formatting.js';
import { HOUR_MS } from '../utils/time.js';
import type { MessageCatalog } from '../core/message-catalog.js';
import type { NotificationSender } from '../core/notification-sender.js';

export interface DigestOptions {
  lookbackHours: number;
  /** Posts listed per channel before the "+N more" marker */
  channelPostCap: number;
  /** Characters kept of each listed post */
  textLimit: number;
}

export type DigestOutcome =
  | { status: 'empty' }
  | { status: 'sent'; postCount: number; channelCount: number }
  | { status: 'failed'; postCount: number };

export interface DigestService {
  deliverDigest(user: User): Promise<DigestOutcome>;
  /**
   * User-requested digest; false when there was nothing to send. A failed
   * delivery is answered with the generic error notice.
   */
  manualDigest(userId: number): Promise<boolean>;
}

export interface DigestServiceDeps {
  store: SubscriptionStore;
  sender: NotificationSender;
  catalog: MessageCatalog;
  options?: Partial<DigestOptions>;
}

interface ChannelGroup {
  title: string;
  posts: DigestPost[];
}

export function digestOptionsFromConfig(): DigestOptions {
  return {
    lookbackHours: config.DIGEST_LOOKBACK_HOURS,
    channelPostCap: config.DIGEST_CHANNEL_POST_CAP,
    textLimit: config.DIGEST_TEXT_LIMIT,
  };
}

/** Group posts by channel, keeping first-seen order of both channels and posts */
export function groupByChannel(posts: readonly DigestPost[]): ChannelGroup[] {
  const groups = new Map<number, ChannelGroup>();
  for (const post of posts) {
    const group = groups.get(post.channelId);
    if (group) {
      group.posts.push(post);
    } else {
      groups.set(post.channelId, { title: post.channelTitle, posts: [post] });
    }
  }
  return [...groups.values()];
}

export function composeDigest(
  posts: readonly DigestPost[],
  language: string,
  catalog: MessageCatalog,
  options: DigestOptions,
): string {
  const lines: string[] = [catalog.render(language, 'digest_header', { hours: options.lookbackHours }), ''];

  for (const group of groupByChannel(posts)) {
    lines.push(catalog.render(language, 'digest_channel', { channel: group.title, count: group.posts.length }));

    for (const post of group.posts.slice(0, options.channelPostCap)) {
      if (!post.text) continue;
      lines.push(`  • ${escapeHtml(ellipsize(post.text, options.textLimit))}`);
    }

    const hidden = group.posts.length - options.channelPostCap;
    if (hidden > 0) {
      lines.push(`  ${catalog.render(language, 'digest_more', { count: hidden })}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

export function createDigestService(deps: DigestServiceDeps): DigestService {
  const { store, sender, catalog } = deps;
  const options: DigestOptions = { ...digestOptionsFromConfig(), ...deps.options };
  const lookbackMs = options.lookbackHours * HOUR_MS;

  async function send(user: User, posts: DigestPost[]): Promise<DigestOutcome> {
    const text = composeDigest(posts, user.language, catalog, options);
    const delivery = await sender.notify(user.id, text);
    if (!delivery.ok) {
      logger.warn({ userId: user.id, posts: posts.length, reason: delivery.reason }, 'Digest not delivered, posts kept');
      return { status: 'failed', postCount: posts.length };
    }

    try {
      await store.markSent(posts.map((post) => post.id));
    } catch (err) {
      logger.error({ err, userId: user.id, posts: posts.length }, 'Digest sent but posts not marked, they may be sent again');
    }

    const channelCount = groupByChannel(posts).length;
    logger.info({ userId: user.id, posts: posts.length, channels: channelCount }, 'Digest sent');
    return { status: 'sent', postCount: posts.length, channelCount };
  }

  return {
    async deliverDigest(user) {
      const posts = await store.unsentPostsForUser(user.id, lookbackMs);
      if (posts.length === 0) {
        logger.debug({ userId: user.id }, 'No posts for digest');
        return { status: 'empty' };
      }
      return send(user, posts);
    },

    async manualDigest(userId) {
      const user = await store.getOrCreateUser(userId);
      const posts = await store.unsentPostsForUser(user.id, lookbackMs);
      if (posts.length === 0) {
        await sender.notify(user.id, catalog.render(user.language, 'no_posts', { hours: options.lookbackHours }));
        return false;
      }
      const outcome = await send(user, posts);
      if (outcome.status === 'failed') {
        await sender.notify(user.id, catalog.render(user.language, 'error'));
      }
      return true;
    },
  };
}
