/**
 * Channel watcher — subscription changes and inbound post routing.
 *
 * Holds the watch set: external ids of channels with at least one
 * subscriber. The set is a write-through cache of the store, rebuilt on
 * start() and only mutated under `lock` together with the store write
 * that justifies the change.
 */

import { logger } from '../middleware/logger.js';
import { normalizeHandle, type Channel, type SubscriptionStore, type User } from '../utils/db.js';
import { sleep as defaultSleep } from '../utils/time.js';
import { Mutex } from './mutex.js';
import type { MessageCatalog } from './message-catalog.js';
import type { NotificationSender, Sleep } from './notification-sender.js';
import type { ChannelTransport, ResolvedChannel, ResolveOutcome } from './transport.js';

const MAX_RESOLVE_RETRIES = 1;

export type SubscribeResult =
  | { status: 'added'; title: string }
  | { status: 'already_added' }
  | { status: 'not_found' };

export type UnsubscribeResult =
  | { status: 'removed'; title: string }
  | { status: 'not_found' };

/** A post observed on a channel, as the transport reports it */
export interface InboundPost {
  channelId: number;
  messageId: number;
  text: string;
}

export type IngestSummary =
  | { status: 'dropped'; reason: 'unwatched' | 'unknown_channel' }
  | { status: 'routed'; relayed: number; failed: number; queued: boolean; skipped: number };

interface Recipient {
  user: User;
  channel: Channel;
}

export interface ChannelWatcher {
  start(): Promise<void>;
  subscribe(userId: number, handle: string): Promise<SubscribeResult>;
  unsubscribe(userId: number, handle: string): Promise<UnsubscribeResult>;
  ingest(post: InboundPost): Promise<IngestSummary>;
  isWatching(externalId: number): Promise<boolean>;
  watchedCount(): Promise<number>;
}

export interface ChannelWatcherDeps {
  store: SubscriptionStore;
  transport: ChannelTransport;
  sender: NotificationSender;
  catalog: MessageCatalog;
  sleep?: Sleep;
}

export function createChannelWatcher(deps: ChannelWatcherDeps): ChannelWatcher {
  const { store, transport, sender, catalog } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const lock = new Mutex();
  const watched = new Set<number>();

  async function resolveOnce(handle: string): Promise<ResolveOutcome | null> {
    try {
      return await transport.resolveChannel(handle);
    } catch (err) {
      logger.error({ err, handle }, 'Channel resolution failed');
      return null;
    }
  }

  async function resolve(handle: string): Promise<ResolvedChannel | null> {
    let outcome = await resolveOnce(handle);

    for (let retry = 0; outcome?.status === 'rate_limited' && retry < MAX_RESOLVE_RETRIES; retry++) {
      logger.warn({ handle, retryAfterSeconds: outcome.retryAfterSeconds }, 'Resolution rate limited, waiting before retry');
      await sleep(outcome.retryAfterSeconds * 1000);
      outcome = await resolveOnce(handle);
    }

    if (outcome === null) return null;

    switch (outcome.status) {
      case 'found':
        return outcome.channel;
      case 'not_found':
      case 'private':
        logger.info({ handle, status: outcome.status }, 'Channel not resolvable');
        return null;
      case 'rate_limited':
        logger.warn({ handle }, 'Resolution still rate limited after retry');
        return null;
    }
  }

  async function route(user: User, title: string, post: InboundPost): Promise<'relayed' | 'failed'> {
    const header = catalog.render(user.language, 'new_post', { channel: title });
    const result = await sender.relay(user.id, header, {
      channelId: post.channelId,
      messageId: post.messageId,
    });
    return result.ok ? 'relayed' : 'failed';
  }

  /**
   * A renamed channel leaves one handle row per username behind, all with the
   * same platform id. The id stays watched while any of them has subscribers.
   * Callers hold `lock`.
   */
  async function releaseIfUnused(externalId: number, handle: string): Promise<void> {
    if ((await store.countSubscribersByExternalId(externalId)) > 0) return;
    watched.delete(externalId);
    logger.info({ handle, externalId }, 'Channel has no subscribers, stopped watching');
  }

  /** Subscribers across every row of the channel, each user once with the row they were found on */
  async function collectRecipients(channels: readonly Channel[]): Promise<Recipient[]> {
    const seen = new Set<number>();
    const recipients: Recipient[] = [];
    for (const channel of channels) {
      for (const user of await store.listSubscribers(channel.id)) {
        if (seen.has(user.id)) continue;
        seen.add(user.id);
        recipients.push({ user, channel });
      }
    }
    return recipients;
  }

  return {
    async start() {
      const channels = await store.listWatchedChannels();
      await lock.runExclusive(() => {
        watched.clear();
        for (const channel of channels) {
          if (channel.externalId !== null) watched.add(channel.externalId);
        }
      });
      logger.info({ watched: watched.size }, 'Channel watcher started');
    },

    async subscribe(userId, handle) {
      const user = await store.getOrCreateUser(userId);
      const key = normalizeHandle(handle);
      if (!key) return { status: 'not_found' };

      const known = await store.getChannelByHandle(key);
      if (known && (await store.hasSubscription(user.id, known.id))) {
        logger.debug({ userId, handle: key }, 'Already subscribed');
        return { status: 'already_added' };
      }

      const resolved = await resolve(key);
      if (!resolved) return { status: 'not_found' };

      return lock.runExclusive(async (): Promise<SubscribeResult> => {
        const channel = await store.resolveOrCreateChannel(key, resolved.externalId, resolved.title);
        const outcome = await store.addSubscription(user.id, channel.id);
        if (outcome === 'already_exists') {
          logger.debug({ userId, handle: key }, 'Subscription raced, already present');
          return { status: 'already_added' };
        }

        // Re-resolution can move a handle to a new platform id
        if (known?.externalId != null && known.externalId !== resolved.externalId) {
          await releaseIfUnused(known.externalId, key);
        }
        watched.add(resolved.externalId);

        logger.info({ userId, handle: key, externalId: resolved.externalId }, 'Subscribed to channel');
        return { status: 'added', title: channel.title };
      });
    },

    async unsubscribe(userId, handle) {
      const key = normalizeHandle(handle);
      if (!key) return { status: 'not_found' };

      const channel = await store.getChannelByHandle(key);
      if (!channel) return { status: 'not_found' };

      return lock.runExclusive(async (): Promise<UnsubscribeResult> => {
        const outcome = await store.removeSubscription(userId, channel.id);
        if (outcome === 'not_found') {
          logger.debug({ userId, handle: key }, 'Not subscribed');
          return { status: 'not_found' };
        }

        if (channel.externalId !== null) await releaseIfUnused(channel.externalId, key);

        logger.info({ userId, handle: key }, 'Unsubscribed from channel');
        return { status: 'removed', title: channel.title };
      });
    },

    async ingest(post) {
      const active = await lock.runExclusive(() => watched.has(post.channelId));
      if (!active) {
        logger.debug({ channelId: post.channelId }, 'Post from unwatched channel dropped');
        return { status: 'dropped', reason: 'unwatched' };
      }

      const channels = await store.listChannelsByExternalId(post.channelId);
      if (channels.length === 0) {
        logger.warn({ channelId: post.channelId }, 'Watched channel missing from store');
        return { status: 'dropped', reason: 'unknown_channel' };
      }

      const recipients = await collectRecipients(channels);
      let relayed = 0;
      let failed = 0;
      let skipped = 0;
      const digestRows = new Set<number>();

      for (const { user, channel } of recipients) {
        switch (user.mode) {
          case 'off':
            skipped++;
            break;
          case 'digest':
            digestRows.add(channel.id);
            break;
          case 'realtime':
            if ((await route(user, channel.title, post)) === 'relayed') relayed++;
            else failed++;
            break;
        }
      }

      // One stored copy per handle row serves that row's digest subscribers
      for (const channelId of digestRows) {
        const outcome = await store.recordPost(channelId, post.messageId, post.text);
        logger.debug({ channelId, messageId: post.messageId, outcome }, 'Post queued for digest');
      }

      const queued = digestRows.size > 0;
      logger.info(
        { channelId: post.channelId, messageId: post.messageId, relayed, failed, skipped, queued },
        'Post routed',
      );
      return { status: 'routed', relayed, failed, queued, skipped };
    },

    isWatching(externalId) {
      return lock.runExclusive(() => watched.has(externalId));
    },

    watchedCount() {
      return lock.runExclusive(() => watched.size);
    },
  };
}
