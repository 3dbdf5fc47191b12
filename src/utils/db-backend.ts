import type {
  AddSubscriptionOutcome,
  Channel,
  DeliveryMode,
  DigestPost,
  RecordPostOutcome,
  RemoveSubscriptionOutcome,
  SubscribedChannel,
  User,
  UserDefaults,
} from './db-types.js';

/**
 * The subscription registry every other component reads and writes.
 *
 * Each operation is atomic on its own: inserts that can collide report the
 * collision as a typed outcome instead of a check-then-insert pair. Any other
 * driver failure is thrown to the caller.
 */
export interface SubscriptionStore {
  // Users
  getOrCreateUser(userId: number, username?: string | null): Promise<User>;
  getUser(userId: number): Promise<User | undefined>;
  setMode(userId: number, mode: DeliveryMode): Promise<User>;
  setDigestTime(userId: number, digestTime: string): Promise<User>;
  setLanguage(userId: number, language: string): Promise<User>;
  usersDueForDigest(digestTime: string): Promise<User[]>;

  // Channels
  resolveOrCreateChannel(handle: string, externalId: number, title: string): Promise<Channel>;
  getChannelByHandle(handle: string): Promise<Channel | undefined>;
  /** Every handle row carrying this platform id, oldest first */
  listChannelsByExternalId(externalId: number): Promise<Channel[]>;
  listWatchedChannels(): Promise<Channel[]>;

  // Subscriptions
  addSubscription(userId: number, channelId: number): Promise<AddSubscriptionOutcome>;
  removeSubscription(userId: number, channelId: number): Promise<RemoveSubscriptionOutcome>;
  hasSubscription(userId: number, channelId: number): Promise<boolean>;
  countSubscribers(channelId: number): Promise<number>;
  /** Subscriptions summed over every handle row with this platform id */
  countSubscribersByExternalId(externalId: number): Promise<number>;
  listSubscribers(channelId: number): Promise<User[]>;
  listSubscriptions(userId: number): Promise<SubscribedChannel[]>;

  // Posts
  recordPost(channelId: number, externalMessageId: number, text: string): Promise<RecordPostOutcome>;
  unsentPostsForUser(userId: number, lookbackMs: number): Promise<DigestPost[]>;
  markSent(postIds: readonly number[]): Promise<void>;
  purgeOlderThan(retentionMs: number): Promise<number>;

  // Lifecycle
  close(): Promise<void>;
}

/** Options shared by every backend */
export interface StoreOptions {
  userDefaults: UserDefaults;
  /** Posts longer than this are cut on ingest */
  ingestTextLimit: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}
