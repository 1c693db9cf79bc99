/**
 * FeedRelay — Publication Rate Limiter
 *
 * Admission rule, per feed:
 *   interval = min(60 / max_news_per_hour, cooldown_minutes)
 *   allow    = published within the last `interval` < max_news_per_hour
 *              and minutes since the last publication >= interval
 *
 * Counts always come from storage. Checks for one feed run one at a time,
 * and `withAdmission` keeps the lock until the publication is recorded.
 */

import type { FeedSource } from '../types/feed';
import type { StorageGateway } from '../db/gateway';
import { KeyedMutex } from '../lib/concurrency';
import { logger as rootLogger, type Logger } from '../lib/logger';

const MINUTE_MS = 60_000;

export interface AdmissionDecision {
  allowed: boolean;
  intervalMinutes: number;
  recentCount: number;
  minutesSinceLast: number | null;
}

export type AdmissionResult<T> = { admitted: false; decision: AdmissionDecision } | { admitted: true; decision: AdmissionDecision; result: T };

type RateLimitedFeed = Pick<FeedSource, 'id' | 'cooldownMinutes' | 'maxNewsPerHour'>;

/**
 * Minutes that must separate two publications of a feed.
 */
export function effectiveIntervalMinutes(feed: Pick<FeedSource, 'cooldownMinutes' | 'maxNewsPerHour'>): number {
  if (feed.maxNewsPerHour <= 0) return Number.POSITIVE_INFINITY;
  return Math.min(60 / feed.maxNewsPerHour, Math.max(0, feed.cooldownMinutes));
}

export class PublicationRateLimiter {
  private readonly storage: StorageGateway;
  private readonly mutex = new KeyedMutex<number>();
  private readonly log: Logger;

  constructor(deps: { storage: StorageGateway; logger?: Logger }) {
    this.storage = deps.storage;
    this.log = (deps.logger ?? rootLogger).child({ component: 'rate-limiter' });
  }

  async mayPublish(feed: RateLimitedFeed, now: Date = new Date()): Promise<boolean> {
    const decision = await this.mutex.runExclusive(feed.id, () => this.decide(feed, now));
    return decision.allowed;
  }

  /**
   * Run `action` only if the feed is admitted, holding the feed's lock until
   * it settles.
   */
  async withAdmission<T>(
    feed: RateLimitedFeed,
    action: () => Promise<T>,
    now: () => Date = () => new Date()
  ): Promise<AdmissionResult<T>> {
    return this.mutex.runExclusive(feed.id, async () => {
      const decision = await this.decide(feed, now());
      if (!decision.allowed) {
        return { admitted: false, decision };
      }
      return { admitted: true, decision, result: await action() };
    });
  }

  private async decide(feed: RateLimitedFeed, now: Date): Promise<AdmissionDecision> {
    const intervalMinutes = effectiveIntervalMinutes(feed);

    if (!Number.isFinite(intervalMinutes)) {
      this.log.debug('Feed publishing disabled by rate limit', { feedId: feed.id });
      return { allowed: false, intervalMinutes, recentCount: 0, minutesSinceLast: null };
    }

    const since = new Date(now.getTime() - intervalMinutes * MINUTE_MS);
    const [recentCount, last] = await Promise.all([
      this.storage.countPublications(feed.id, since),
      this.storage.lastPublicationTime(feed.id),
    ]);

    const minutesSinceLast = last ? (now.getTime() - last.getTime()) / MINUTE_MS : null;
    const allowed =
      recentCount < feed.maxNewsPerHour &&
      (minutesSinceLast === null || minutesSinceLast >= intervalMinutes);

    if (!allowed) {
      this.log.debug('Publication deferred by rate limit', {
        feedId: feed.id,
        intervalMinutes,
        recentCount,
        minutesSinceLast: minutesSinceLast === null ? null : Math.round(minutesSinceLast),
      });
    }

    return { allowed, intervalMinutes, recentCount, minutesSinceLast };
  }
}
