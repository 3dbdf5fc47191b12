export type MessagingPlatform = 'telegram';

export interface PlatformRuntime {
  platform: MessagingPlatform;
  start(): Promise<void>;
  stop(): Promise<void>;
}
