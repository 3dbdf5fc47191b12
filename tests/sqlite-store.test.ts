import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SubscriptionStore } from '../src/utils/db.js';
import { DAY_MS, HOUR_MS, MINUTE_MS } from '../src/utils/time.js';
import { T0, createClock, createTestStore, type TestClock } from './support/fakes.js';

describe('sqlite subscription store', () => {
  let clock: TestClock;
  let store: SubscriptionStore;

  beforeEach(() => {
    clock = createClock();
    store = createTestStore(clock);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('users', () => {
    it('creates users lazily with the configured defaults', async () => {
      const user = await store.getOrCreateUser(42, 'alice');
      expect(user).toEqual({
        id: 42,
        username: 'alice',
        mode: 'realtime',
        digestTime: '09:00',
        language: 'en',
        createdAt: T0 / 1000,
      });
      expect(await store.getUser(43)).toBeUndefined();
    });

    it('keeps stored preferences when the user comes back', async () => {
      await store.setMode(7, 'digest');
      await store.setDigestTime(7, '21:15');
      await store.setLanguage(7, 'ru');

      const user = await store.getOrCreateUser(7, 'bob');
      expect(user.mode).toBe('digest');
      expect(user.digestTime).toBe('21:15');
      expect(user.language).toBe('ru');
      expect(user.username).toBe('bob');
    });

    it('does not clear a known username when none is supplied', async () => {
      await store.getOrCreateUser(8, 'carol');
      const again = await store.getOrCreateUser(8);
      expect(again.username).toBe('carol');
    });

    it('lists only digest users due at the exact minute', async () => {
      await store.setMode(1, 'digest');
      await store.setDigestTime(1, '08:30');
      await store.setDigestTime(2, '08:30');
      await store.setMode(3, 'digest');

      const due = await store.usersDueForDigest('08:30');
      expect(due.map((u) => u.id)).toEqual([1]);
      expect((await store.usersDueForDigest('09:00')).map((u) => u.id)).toEqual([3]);
    });
  });

  describe('channels and subscriptions', () => {
    it('stores handles case-insensitively without the leading @', async () => {
      const channel = await store.resolveOrCreateChannel('@News_Feed', 100, 'News');
      expect(channel.handle).toBe('news_feed');

      const found = await store.getChannelByHandle('NEWS_FEED');
      expect(found?.id).toBe(channel.id);
      expect((await store.listChannelsByExternalId(100)).map((c) => c.id)).toEqual([channel.id]);
    });

    it('keeps one row per handle when a channel is renamed', async () => {
      await store.getOrCreateUser(1);
      await store.getOrCreateUser(2);
      const before = await store.resolveOrCreateChannel('oldname', 700, 'Renamed');
      const after = await store.resolveOrCreateChannel('newname', 700, 'Renamed');
      await store.addSubscription(1, before.id);
      await store.addSubscription(2, after.id);

      expect((await store.listChannelsByExternalId(700)).map((c) => c.handle)).toEqual(['oldname', 'newname']);
      expect(await store.countSubscribersByExternalId(700)).toBe(2);

      await store.removeSubscription(1, before.id);
      expect(await store.countSubscribersByExternalId(700)).toBe(1);
      expect(await store.countSubscribersByExternalId(701)).toBe(0);
    });

    it('upserts a single row for concurrent resolutions of one handle', async () => {
      const [first, second] = await Promise.all([
        store.resolveOrCreateChannel('daily', 200, 'Daily'),
        store.resolveOrCreateChannel('@Daily', 201, 'Daily News'),
      ]);

      expect(first.id).toBe(second.id);
      const current = await store.getChannelByHandle('daily');
      expect(current).toEqual({ id: first.id, externalId: 201, handle: 'daily', title: 'Daily News' });
    });

    it('reports duplicate and missing subscriptions as outcomes', async () => {
      await store.getOrCreateUser(1);
      const channel = await store.resolveOrCreateChannel('tech', 300, 'Tech');

      expect(await store.addSubscription(1, channel.id)).toBe('added');
      expect(await store.addSubscription(1, channel.id)).toBe('already_exists');
      expect(await store.hasSubscription(1, channel.id)).toBe(true);
      expect(await store.countSubscribers(channel.id)).toBe(1);

      expect(await store.removeSubscription(1, channel.id)).toBe('removed');
      expect(await store.removeSubscription(1, channel.id)).toBe('not_found');
      expect(await store.countSubscribers(channel.id)).toBe(0);
    });

    it('lists watched channels, subscribers and subscriptions', async () => {
      await store.getOrCreateUser(1);
      await store.getOrCreateUser(2);
      const zeta = await store.resolveOrCreateChannel('zeta', 10, 'Zeta');
      const alpha = await store.resolveOrCreateChannel('alpha', 11, 'Alpha');
      await store.resolveOrCreateChannel('orphan', 12, 'Orphan');

      await store.addSubscription(1, zeta.id);
      await store.addSubscription(1, alpha.id);
      await store.addSubscription(2, zeta.id);

      const watched = await store.listWatchedChannels();
      expect(watched.map((c) => c.handle)).toEqual(['zeta', 'alpha']);

      const subscribers = await store.listSubscribers(zeta.id);
      expect(subscribers.map((u) => u.id)).toEqual([1, 2]);

      const subscriptions = await store.listSubscriptions(1);
      expect(subscriptions.map((c) => c.title)).toEqual(['Alpha', 'Zeta']);
      expect(subscriptions[0]?.subscribedAt).toBe(T0 / 1000);
    });
  });

  describe('posts', () => {
    async function subscribedChannel(): Promise<number> {
      await store.getOrCreateUser(1);
      const channel = await store.resolveOrCreateChannel('feed', 500, 'Feed');
      await store.addSubscription(1, channel.id);
      return channel.id;
    }

    it('ignores a repeated (channel, message) pair', async () => {
      const channelId = await subscribedChannel();

      expect(await store.recordPost(channelId, 9, 'hello')).toBe('recorded');
      expect(await store.recordPost(channelId, 9, 'hello again')).toBe('duplicate_ignored');

      const posts = await store.unsentPostsForUser(1, DAY_MS);
      expect(posts).toHaveLength(1);
      expect(posts[0]?.text).toBe('hello');
    });

    it('truncates stored text to the ingest limit', async () => {
      const channelId = await subscribedChannel();
      await store.recordPost(channelId, 1, 'x'.repeat(600));

      const [post] = await store.unsentPostsForUser(1, DAY_MS);
      expect(post?.text).toHaveLength(500);
    });

    it('does not store half of an emoji at the ingest limit', async () => {
      const channelId = await subscribedChannel();
      await store.recordPost(channelId, 1, `${'x'.repeat(499)}😀`);

      const [post] = await store.unsentPostsForUser(1, DAY_MS);
      expect(post?.text).toBe('x'.repeat(499));
    });

    it('returns unsent posts inside the lookback window, newest first', async () => {
      const channelId = await subscribedChannel();

      clock.set(T0 - 25 * HOUR_MS);
      await store.recordPost(channelId, 1, 'too old');
      clock.set(T0);
      await store.recordPost(channelId, 2, 'older');
      clock.advance(MINUTE_MS);
      await store.recordPost(channelId, 3, 'newer');

      const posts = await store.unsentPostsForUser(1, 24 * HOUR_MS);
      expect(posts.map((p) => p.externalMessageId)).toEqual([3, 2]);
      expect(posts[0]).toMatchObject({ channelTitle: 'Feed', channelHandle: 'feed', sent: false });

      expect(await store.unsentPostsForUser(2, 24 * HOUR_MS)).toEqual([]);
    });

    it('marks posts sent in bulk', async () => {
      const channelId = await subscribedChannel();
      await store.recordPost(channelId, 1, 'a');
      await store.recordPost(channelId, 2, 'b');

      const posts = await store.unsentPostsForUser(1, DAY_MS);
      await store.markSent([]);
      expect(await store.unsentPostsForUser(1, DAY_MS)).toHaveLength(2);

      await store.markSent(posts.map((p) => p.id));
      expect(await store.unsentPostsForUser(1, DAY_MS)).toEqual([]);
    });

    it('purges posts older than the retention window whether sent or not', async () => {
      const channelId = await subscribedChannel();

      clock.set(T0 - 8 * DAY_MS);
      await store.recordPost(channelId, 1, 'eight days');
      clock.set(T0 - DAY_MS);
      await store.recordPost(channelId, 2, 'one day');
      clock.set(T0);

      expect(await store.purgeOlderThan(7 * DAY_MS)).toBe(1);

      const remaining = await store.unsentPostsForUser(1, 30 * DAY_MS);
      expect(remaining.map((p) => p.text)).toEqual(['one day']);
    });
  });
});
