/**
 * Rate-limit-aware delivery shim shared by realtime routing and digests.
 *
 * A rate-limited call waits the transport-given delay and is retried once.
 * Every failure is logged and reported as `{ ok: false }`; nothing here
 * throws, so one bad recipient never stops a fan-out loop.
 */

import { logger } from '../middleware/logger.js';
import { sleep as defaultSleep } from '../utils/time.js';
import type { ChannelTransport, ExternalMessageRef, SendOutcome } from './transport.js';

const MAX_RATE_LIMIT_RETRIES = 1;

export type Sleep = (ms: number) => Promise<void>;

export type DeliveryResult =
  | { ok: true }
  | { ok: false; reason: 'rate_limited' | 'failed' };

export interface NotificationSender {
  notify(userId: number, text: string): Promise<DeliveryResult>;
  forward(userId: number, ref: ExternalMessageRef): Promise<DeliveryResult>;
  /** Realtime path: header, original post, then a short pause */
  relay(userId: number, header: string, ref: ExternalMessageRef): Promise<DeliveryResult>;
}

export interface NotificationSenderOptions {
  /** Pause after each realtime relay */
  interSendDelayMs: number;
  sleep?: Sleep;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createNotificationSender(
  transport: ChannelTransport,
  options: NotificationSenderOptions,
): NotificationSender {
  const sleep = options.sleep ?? defaultSleep;

  async function attempt(call: () => Promise<SendOutcome>): Promise<SendOutcome> {
    try {
      return await call();
    } catch (err) {
      return { status: 'failed', error: describeError(err) };
    }
  }

  async function deliver(
    kind: 'notify' | 'forward',
    userId: number,
    call: () => Promise<SendOutcome>,
  ): Promise<DeliveryResult> {
    let outcome = await attempt(call);

    for (let retry = 0; outcome.status === 'rate_limited' && retry < MAX_RATE_LIMIT_RETRIES; retry++) {
      logger.warn({ kind, userId, retryAfterSeconds: outcome.retryAfterSeconds }, 'Rate limited, waiting before retry');
      await sleep(outcome.retryAfterSeconds * 1000);
      outcome = await attempt(call);
    }

    switch (outcome.status) {
      case 'ok':
        return { ok: true };
      case 'rate_limited':
        logger.warn({ kind, userId, retryAfterSeconds: outcome.retryAfterSeconds }, 'Still rate limited after retry, giving up');
        return { ok: false, reason: 'rate_limited' };
      case 'failed':
        logger.error({ kind, userId, error: outcome.error }, 'Delivery failed');
        return { ok: false, reason: 'failed' };
    }
  }

  const sender: NotificationSender = {
    notify(userId, text) {
      return deliver('notify', userId, () => transport.notify(userId, text));
    },

    forward(userId, ref) {
      return deliver('forward', userId, () => transport.forward(userId, ref));
    },

    async relay(userId, header, ref) {
      const headerResult = await sender.notify(userId, header);
      // A recipient that cannot take the header will not take the post either
      const result = headerResult.ok ? await sender.forward(userId, ref) : headerResult;
      await sleep(options.interSendDelayMs);
      return result;
    },
  };

  return sender;
}
