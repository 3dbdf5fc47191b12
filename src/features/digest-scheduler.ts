/**
 * Minute-resolution digest loop.
 *
 * Ticks once on start, then at every minute boundary via setTimeout (no
 * cron dependency). Each tick delivers the digests due at that HH:MM and,
 * at midnight, purges posts past the retention window.
 */

import { logger } from '../middleware/logger.js';
import { config } from '../utils/config.js';
import type { SubscriptionStore } from '../utils/db.js';
import { DAY_MS, formatClock, minuteKey, msUntilNextMinute } from '../utils/time.js';
import type { DigestService } from './digest.js';

const PURGE_CLOCK = '00:00';

export type SchedulerState = 'idle' | 'ticking' | 'terminated';

export interface TickReport {
  clock: string;
  due: number;
  sent: number;
  failed: number;
  /** Rows removed by the midnight purge; null on every other tick */
  purged: number | null;
}

export interface DigestScheduler {
  readonly state: SchedulerState;
  start(): void;
  /** Cancel the pending timer and wait for a running tick to finish */
  stop(): Promise<void>;
  tick(now: Date): Promise<TickReport>;
}

export interface DigestSchedulerDeps {
  store: SubscriptionStore;
  digest: DigestService;
  retentionDays?: number;
  clock?: () => Date;
}

export function createDigestScheduler(deps: DigestSchedulerDeps): DigestScheduler {
  const { store, digest } = deps;
  const retentionMs = (deps.retentionDays ?? config.POST_RETENTION_DAYS) * DAY_MS;
  const clock = deps.clock ?? (() => new Date());

  let state: SchedulerState = 'idle';
  let timer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<void> | null = null;
  let lastMinute: string | null = null;

  async function deliverDue(hhmm: string, report: TickReport): Promise<void> {
    try {
      const users = await store.usersDueForDigest(hhmm);
      report.due = users.length;

      for (const user of users) {
        try {
          const outcome = await digest.deliverDigest(user);
          if (outcome.status === 'sent') report.sent++;
          else if (outcome.status === 'failed') report.failed++;
        } catch (err) {
          report.failed++;
          logger.error({ err, userId: user.id }, 'Scheduled digest failed');
        }
      }
    } catch (err) {
      logger.error({ err, clock: hhmm }, 'Could not load users due for digest');
    }
  }

  async function purge(report: TickReport): Promise<void> {
    try {
      report.purged = await store.purgeOlderThan(retentionMs);
      logger.info({ purged: report.purged, retentionDays: retentionMs / DAY_MS }, 'Old posts purged');
    } catch (err) {
      logger.error({ err }, 'Post purge failed');
    }
  }

  async function tick(now: Date): Promise<TickReport> {
    const hhmm = formatClock(now);
    const report: TickReport = { clock: hhmm, due: 0, sent: 0, failed: 0, purged: null };

    if (state !== 'terminated') state = 'ticking';
    try {
      await deliverDue(hhmm, report);
      if (hhmm === PURGE_CLOCK) await purge(report);
    } finally {
      if (state === 'ticking') state = 'idle';
    }

    if (report.due > 0) {
      logger.info({ ...report }, 'Digest tick finished');
    }
    return report;
  }

  function scheduleNext(): void {
    if (state === 'terminated') return;
    timer = setTimeout(() => {
      timer = null;
      runLoopTick();
    }, msUntilNextMinute(clock()));
  }

  function runLoopTick(): void {
    if (state === 'terminated') return;

    const now = clock();
    const key = minuteKey(now);
    if (key === lastMinute) {
      // Timer fired early; this minute was already handled
      scheduleNext();
      return;
    }
    lastMinute = key;

    inFlight = tick(now)
      .then(() => undefined)
      .catch((err: unknown) => {
        logger.error({ err }, 'Digest tick failed');
      })
      .finally(() => {
        inFlight = null;
        scheduleNext();
      });
  }

  return {
    get state() {
      return state;
    },

    start() {
      if (state === 'terminated') {
        throw new Error('Digest scheduler cannot be restarted after stop()');
      }
      if (timer || inFlight) return;
      logger.info({ retentionDays: retentionMs / DAY_MS }, 'Digest scheduler started');
      runLoopTick();
    },

    async stop() {
      state = 'terminated';
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (inFlight) await inFlight;
      logger.info('Digest scheduler stopped');
    },

    tick,
  };
}
