/**
 * Tests for the publication rate limiter
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PublicationRateLimiter, effectiveIntervalMinutes } from '../../src/publishing/rate-limiter';
import { InMemoryStorage, createFeed, createItem } from '../fakes/storage';
import { RecordingLogger } from '../fakes/logger';

const T0 = new Date('2026-03-01T12:00:00.000Z');
const minutesAfter = (base: Date, minutes: number) => new Date(base.getTime() + minutes * 60_000);

describe('effectiveIntervalMinutes', () => {
  it('should take the smaller of the hourly spacing and the cooldown', () => {
    expect(effectiveIntervalMinutes({ cooldownMinutes: 10, maxNewsPerHour: 10 })).toBe(6);
    expect(effectiveIntervalMinutes({ cooldownMinutes: 2, maxNewsPerHour: 10 })).toBe(2);
    expect(effectiveIntervalMinutes({ cooldownMinutes: 120, maxNewsPerHour: 1 })).toBe(60);
  });

  it('should be infinite when the feed may not publish at all', () => {
    expect(effectiveIntervalMinutes({ cooldownMinutes: 10, maxNewsPerHour: 0 })).toBe(Number.POSITIVE_INFINITY);
  });
});

describe('PublicationRateLimiter', () => {
  let storage: InMemoryStorage;
  let limiter: PublicationRateLimiter;

  beforeEach(() => {
    storage = new InMemoryStorage(() => T0);
    limiter = new PublicationRateLimiter({ storage, logger: new RecordingLogger() });
    storage.items.set('news-1', createItem({ newsId: 'news-1', rssFeedId: 1 }));
  });

  const publishAt = (sentAt: Date, newsId = 'news-1') =>
    storage.recordPublication({
      newsId,
      translationId: null,
      recipientType: 'channel',
      recipientId: '@feed_en',
      messageId: '1',
      language: 'en',
      sentAt: sentAt.toISOString(),
    });

  it('should admit a feed that has never published', async () => {
    await expect(limiter.mayPublish(createFeed(), T0)).resolves.toBe(true);
  });

  it('should hold a feed until the interval has passed', async () => {
    const feed = createFeed({ cooldownMinutes: 120, maxNewsPerHour: 1 });
    await publishAt(T0);

    await expect(limiter.mayPublish(feed, minutesAfter(T0, 30))).resolves.toBe(false);
    await expect(limiter.mayPublish(feed, minutesAfter(T0, 61))).resolves.toBe(true);
  });

  it('should admit exactly at the interval boundary', async () => {
    const feed = createFeed({ cooldownMinutes: 2, maxNewsPerHour: 10 });
    await publishAt(T0);

    await expect(limiter.mayPublish(feed, minutesAfter(T0, 1))).resolves.toBe(false);
    await expect(limiter.mayPublish(feed, minutesAfter(T0, 2))).resolves.toBe(true);
  });

  it('should only count publications of the same feed', async () => {
    storage.items.set('other-1', createItem({ newsId: 'other-1', rssFeedId: 2 }));
    await publishAt(T0, 'other-1');

    await expect(limiter.mayPublish(createFeed({ id: 1 }), minutesAfter(T0, 1))).resolves.toBe(true);
  });

  it('should never admit a feed with a zero hourly limit', async () => {
    const count = vi.spyOn(storage, 'countPublications');

    await expect(limiter.mayPublish(createFeed({ maxNewsPerHour: 0 }), T0)).resolves.toBe(false);
    expect(count).not.toHaveBeenCalled();
  });

  it('should run the action only when admitted', async () => {
    const feed = createFeed({ cooldownMinutes: 60, maxNewsPerHour: 1 });
    await publishAt(T0);
    const action = vi.fn(async () => 'sent');

    const result = await limiter.withAdmission(feed, action, () => minutesAfter(T0, 5));

    expect(result).toMatchObject({ admitted: false, decision: { allowed: false, recentCount: 1, intervalMinutes: 60 } });
    expect(action).not.toHaveBeenCalled();
  });

  it('should let only one of two concurrent publications through', async () => {
    const feed = createFeed({ cooldownMinutes: 60, maxNewsPerHour: 1 });
    const send = async () => {
      await publishAt(T0);
      return 'sent';
    };

    const results = await Promise.all([
      limiter.withAdmission(feed, send, () => T0),
      limiter.withAdmission(feed, send, () => T0),
    ]);

    expect(results.map((r) => r.admitted)).toEqual([true, false]);
    expect(results[0]).toMatchObject({ admitted: true, result: 'sent' });
  });
});
