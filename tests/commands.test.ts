import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createCommandHandler, extractHandle, parseCommand, type CommandHandler } from '../src/features/commands.js';
import { createDigestService } from '../src/features/digest.js';
import { createChannelWatcher } from '../src/core/channel-watcher.js';
import { createNotificationSender } from '../src/core/notification-sender.js';
import type { SubscriptionStore } from '../src/utils/db.js';
import {
  FakeTransport,
  createClock,
  createRecordingSleep,
  createTestCatalog,
  createTestStore,
} from './support/fakes.js';

describe('command parsing', () => {
  it('splits the command name from its arguments', () => {
    expect(parseCommand('/add @news')).toEqual({ name: 'add', args: '@news' });
    expect(parseCommand('  /LIST  ')).toEqual({ name: 'list', args: '' });
    expect(parseCommand('/time@channelcast_bot 08:15')).toEqual({ name: 'time', args: '08:15' });
    expect(parseCommand('hello there')).toBeNull();
  });

  it('accepts usernames and t.me links as handles', () => {
    expect(extractHandle('@tech_news')).toBe('@tech_news');
    expect(extractHandle('https://t.me/tech_news')).toBe('tech_news');
    expect(extractHandle('tech-news')).toBeNull();
  });
});

describe('command handler', () => {
  let store: SubscriptionStore;
  let transport: FakeTransport;
  let handle: CommandHandler;

  const send = (text: string, userId = 1) => handle({ userId, username: 'tester', text });

  beforeEach(async () => {
    store = createTestStore(createClock());
    transport = new FakeTransport();
    transport.addChannel('technews', -100, 'Tech <News>');

    const catalog = createTestCatalog();
    const { sleep } = createRecordingSleep();
    const sender = createNotificationSender(transport, { interSendDelayMs: 0, sleep });
    const watcher = createChannelWatcher({ store, transport, sender, catalog, sleep });
    const digest = createDigestService({
      store,
      sender,
      catalog,
      options: { lookbackHours: 24, channelPostCap: 5, textLimit: 100 },
    });
    await watcher.start();
    handle = createCommandHandler({ store, watcher, digest, catalog });
  });

  afterEach(async () => {
    await store.close();
  });

  it('registers the user on /start', async () => {
    const reply = await send('/start');
    expect(reply).toContain('<b>Channelcast</b>');
    expect(await store.getUser(1)).toMatchObject({ username: 'tester', mode: 'realtime' });
  });

  it('adds, lists and removes channels', async () => {
    expect(await send('/add @TechNews')).toBe('✅ Channel <b>Tech &lt;News&gt;</b> added!');
    expect(await send('/add technews')).toBe('⚠️ This channel is already in your list.');
    expect(await send('/list')).toBe('📋 <b>Your channels:</b>\n\n• @technews - Tech &lt;News&gt;');
    expect(await send('/remove @technews')).toBe('🗑 Channel <b>Tech &lt;News&gt;</b> removed!');
    expect(await send('/remove @technews')).toBe('⚠️ This channel is not in your list.');
    expect(await send('/list')).toBe('📭 You have no channels yet.\nAdd one with /add @channel');
  });

  it('explains missing or malformed arguments', async () => {
    expect(await send('/add')).toBe('Usage: /add @channel');
    expect(await send('/remove')).toBe('Usage: /remove @channel');
    expect(await send('/add not-a-channel')).toBe('❌ That does not look like a channel username.');
    expect(await send('/add @nowhere')).toBe('❌ Channel not found or not accessible.');
  });

  it('validates and applies preferences', async () => {
    expect(await send('/mode weekly')).toBe('❌ Unknown mode. Choose one of: realtime, digest, off');
    expect(await send('/mode Digest')).toBe('✅ Mode changed: <b>📰 Digest</b>');
    expect(await send('/time 25:00')).toBe('❌ Invalid time format. Example: 09:00');
    expect(await send('/time 7:05')).toBe('✅ Digest time changed: <b>07:05</b>');
    expect(await send('/lang de')).toBe('❌ Unsupported language. Choose one of: uz, ru, en');

    expect(await store.getUser(1)).toMatchObject({ mode: 'digest', digestTime: '07:05', language: 'en' });
  });

  it('confirms a language change in the new language', async () => {
    expect(await send('/lang ru')).toBe('✅ Язык изменён: <b>Русский</b>');
    expect(await send('/settings')).toBe(
      '⚙️ <b>Настройки</b>\n\nРежим: <b>🔴 Realtime</b>\nВремя дайджеста: <b>09:00</b>\nЯзык: <b>Русский</b>',
    );
  });

  it('sends the manual digest itself and replies with nothing', async () => {
    expect(await send('/digest')).toBeNull();
    expect(transport.notificationsFor(1)).toEqual(['📭 No new posts in the last 24 hours.']);
  });

  it('ignores plain text and flags unknown commands', async () => {
    expect(await send('just chatting')).toBeNull();
    expect(await send('/frobnicate')).toBe('🤔 Unknown command. Send /help to see the commands.');
  });

  it('replies with the generic error when the store fails', async () => {
    vi.spyOn(store, 'listSubscriptions').mockRejectedValue(new Error('disk I/O error'));
    expect(await send('/list')).toBe('❌ Something went wrong. Please try again.');
  });
});
