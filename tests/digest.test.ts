import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { composeDigest, createDigestService, groupByChannel, type DigestService } from '../src/features/digest.js';
import { createNotificationSender } from '../src/core/notification-sender.js';
import type { DigestPost, SubscriptionStore } from '../src/utils/db.js';
import { DAY_MS, MINUTE_MS } from '../src/utils/time.js';
import {
  FakeTransport,
  createClock,
  createRecordingSleep,
  createTestCatalog,
  createTestStore,
  type TestClock,
} from './support/fakes.js';

const OPTIONS = { lookbackHours: 24, channelPostCap: 5, textLimit: 100 };

function post(id: number, channelId: number, channelTitle: string, text: string): DigestPost {
  return {
    id,
    channelId,
    externalMessageId: id,
    text,
    createdAt: 0,
    sent: false,
    channelTitle,
    channelHandle: channelTitle.toLowerCase(),
  };
}

describe('digest composition', () => {
  const catalog = createTestCatalog();

  it('groups by channel in first-seen order', () => {
    const groups = groupByChannel([post(1, 2, 'B', 'x'), post(2, 1, 'A', 'y'), post(3, 2, 'B', 'z')]);
    expect(groups.map((g) => [g.title, g.posts.map((p) => p.id)])).toEqual([
      ['B', [1, 3]],
      ['A', [2]],
    ]);
  });

  it('cuts long posts and escapes HTML in titles and text', () => {
    const text = composeDigest(
      [post(1, 1, 'Q&A', '<b>bold</b> & more'), post(2, 1, 'Q&A', 'z'.repeat(150))],
      'en',
      catalog,
      OPTIONS,
    );

    expect(text.split('\n')).toEqual([
      '📰 <b>Digest for the last 24 hours</b>',
      '',
      '📢 <b>Q&amp;A</b> (2)',
      '  • &lt;b&gt;bold&lt;/b&gt; &amp; more',
      `  • ${'z'.repeat(100)}...`,
    ]);
  });

  it('does not split an emoji when cutting a post', () => {
    const text = composeDigest([post(1, 1, 'Emoji', `${'a'.repeat(99)}😀 tail`)], 'en', catalog, OPTIONS);
    expect(text.split('\n').at(-1)).toBe(`  • ${'a'.repeat(99)}...`);
  });

  it('counts posts without text but does not list them', () => {
    const text = composeDigest([post(1, 1, 'Pics', ''), post(2, 1, 'Pics', 'caption')], 'en', catalog, OPTIONS);
    expect(text.split('\n').slice(2)).toEqual(['📢 <b>Pics</b> (2)', '  • caption']);
  });

  it('renders in the requested language', () => {
    const text = composeDigest([post(1, 1, 'Kanal', 'salom')], 'uz', catalog, OPTIONS);
    expect(text.split('\n')[0]).toBe('📰 <b>Oxirgi 24 soat xulosasi</b>');
  });
});

describe('digest delivery', () => {
  let clock: TestClock;
  let store: SubscriptionStore;
  let transport: FakeTransport;
  let digest: DigestService;

  async function subscribe(userId: number, handle: string, externalId: number, title: string): Promise<number> {
    await store.getOrCreateUser(userId);
    const channel = await store.resolveOrCreateChannel(handle, externalId, title);
    await store.addSubscription(userId, channel.id);
    return channel.id;
  }

  async function record(channelId: number, messageId: number, text: string): Promise<void> {
    clock.advance(MINUTE_MS);
    await store.recordPost(channelId, messageId, text);
  }

  beforeEach(async () => {
    clock = createClock();
    store = createTestStore(clock);
    transport = new FakeTransport();
    const { sleep } = createRecordingSleep();
    const sender = createNotificationSender(transport, { interSendDelayMs: 0, sleep });
    digest = createDigestService({ store, sender, catalog: createTestCatalog(), options: OPTIONS });
    await store.setMode(1, 'digest');
  });

  afterEach(async () => {
    await store.close();
  });

  it('sends one message capped per channel and marks every fetched post sent', async () => {
    const alpha = await subscribe(1, 'alpha', -1, 'Alpha');
    const beta = await subscribe(1, 'beta', -2, 'Beta & Co');
    for (let n = 1; n <= 6; n++) await record(alpha, n, `alpha ${n}`);
    await record(beta, 1, 'beta 1');
    await record(beta, 2, 'beta 2');

    const user = await store.getOrCreateUser(1);
    const outcome = await digest.deliverDigest(user);

    expect(outcome).toEqual({ status: 'sent', postCount: 8, channelCount: 2 });
    expect(transport.notificationsFor(1)).toEqual([
      [
        '📰 <b>Digest for the last 24 hours</b>',
        '',
        '📢 <b>Beta &amp; Co</b> (2)',
        '  • beta 2',
        '  • beta 1',
        '',
        '📢 <b>Alpha</b> (6)',
        '  • alpha 6',
        '  • alpha 5',
        '  • alpha 4',
        '  • alpha 3',
        '  • alpha 2',
        '  <i>+1 more</i>',
      ].join('\n'),
    ]);
    expect(await store.unsentPostsForUser(1, DAY_MS)).toEqual([]);

    // Nothing left: a manual request gets the notice instead
    expect(await digest.manualDigest(1)).toBe(false);
    expect(transport.notificationsFor(1).at(-1)).toBe('📭 No new posts in the last 24 hours.');
  });

  it('sends nothing on a scheduled run without posts', async () => {
    const user = await store.getOrCreateUser(1);
    expect(await digest.deliverDigest(user)).toEqual({ status: 'empty' });
    expect(transport.sent).toEqual([]);
  });

  it('keeps posts unsent when delivery fails', async () => {
    const feed = await subscribe(1, 'feed', -3, 'Feed');
    await record(feed, 1, 'first');
    transport.queueSend(1, { status: 'failed', error: '403: Forbidden' });

    const user = await store.getOrCreateUser(1);
    expect(await digest.deliverDigest(user)).toEqual({ status: 'failed', postCount: 1 });
    expect(await store.unsentPostsForUser(1, DAY_MS)).toHaveLength(1);
  });

  it('reports true for a manual digest whenever posts existed', async () => {
    const feed = await subscribe(1, 'feed', -3, 'Feed');
    await record(feed, 1, 'first');
    transport.queueSend(1, { status: 'failed', error: 'timeout' });

    expect(await digest.manualDigest(1)).toBe(true);
    expect(await store.unsentPostsForUser(1, DAY_MS)).toHaveLength(1);
    expect(transport.notificationsFor(1)).toEqual(['❌ Something went wrong. Please try again.']);

    expect(await digest.manualDigest(1)).toBe(true);
    expect(await store.unsentPostsForUser(1, DAY_MS)).toEqual([]);
  });

  it('leaves out posts older than the lookback window', async () => {
    const feed = await subscribe(1, 'feed', -3, 'Feed');
    await record(feed, 1, 'stale');
    clock.advance(DAY_MS);
    await record(feed, 2, 'fresh');

    const user = await store.getOrCreateUser(1);
    expect(await digest.deliverDigest(user)).toEqual({ status: 'sent', postCount: 1, channelCount: 1 });
    expect(transport.notificationsFor(1)[0]).toContain('  • fresh');
    expect(transport.notificationsFor(1)[0]).not.toContain('stale');
  });
});
