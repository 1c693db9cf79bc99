/**
 * Tests for retry policies
 */

import { describe, it, expect, vi } from 'vitest';
import { computeDelay, isTransientError, withRetry, type RetryPolicy } from '../../src/lib/retry';
import { CancelledError, FeedFetchError } from '../../src/lib/errors';

const policy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 250,
  factor: 2,
  jitter: 0,
};

const noSleep = () => Promise.resolve();

describe('computeDelay', () => {
  it('should grow exponentially up to the cap', () => {
    expect(computeDelay(policy, 1)).toBe(100);
    expect(computeDelay(policy, 2)).toBe(200);
    expect(computeDelay(policy, 3)).toBe(250);
  });

  it('should spread by the jitter fraction', () => {
    const jittered = { ...policy, jitter: 0.5 };
    expect(computeDelay(jittered, 1, () => 0)).toBe(50);
    expect(computeDelay(jittered, 1, () => 1)).toBe(150);
    expect(computeDelay(jittered, 1, () => 0.5)).toBe(100);
  });
});

describe('isTransientError', () => {
  it('should classify statuses', () => {
    expect(isTransientError(new FeedFetchError('https://example.org', 'HTTP 503', 503))).toBe(true);
    expect(isTransientError(new FeedFetchError('https://example.org', 'HTTP 429', 429))).toBe(true);
    expect(isTransientError(new FeedFetchError('https://example.org', 'HTTP 404', 404))).toBe(false);
  });

  it('should classify network failures by message', () => {
    expect(isTransientError(new Error('read ECONNRESET'))).toBe(true);
    expect(isTransientError(new Error('fetch failed'))).toBe(true);
    expect(isTransientError(new Error('invalid input'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('should return the first success', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');

    const result = await withRetry(operation, policy, { sleep: noSleep });

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenLastCalledWith(2);
  });

  it('should rethrow the last error after the final attempt', async () => {
    let calls = 0;
    const operation = async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(operation, policy, { sleep: noSleep })).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
  });

  it('should not retry errors the predicate rejects', async () => {
    const operation = vi.fn(async () => {
      throw new CancelledError('stop');
    });

    await expect(
      withRetry(operation, policy, {
        sleep: noSleep,
        isRetryable: (error) => !(error instanceof CancelledError),
      })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should report each retry with its delay', async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(async () => {
      throw new Error('boom');
    });

    await expect(withRetry(operation, policy, { sleep: noSleep, onRetry })).rejects.toThrow('boom');

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 100],
      [2, 200],
    ]);
  });

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    await expect(withRetry(operation, policy, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(operation).not.toHaveBeenCalled();
  });
});
