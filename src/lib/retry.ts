/**
 * FeedRelay — Retry
 *
 * Exponential backoff with a cap and optional jitter.
 * Storage writes, feed fetches, embeddings and translations all go through here.
 */

import { CancelledError } from './errors';
import { sleep } from './concurrency';

// ============================================================
// TYPES
// ============================================================

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** 0 disables jitter; 0.2 spreads each delay by up to ±20% */
  jitter: number;
}

export interface RetryOptions {
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

// ============================================================
// POLICIES
// ============================================================

export const STORAGE_RETRY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  factor: 2,
  jitter: 0.2,
};

export const FETCH_RETRY: RetryPolicy = {
  maxAttempts: 2,
  baseDelayMs: 1_000,
  maxDelayMs: 5_000,
  factor: 2,
  jitter: 0.2,
};

// ============================================================
// HELPERS
// ============================================================

export function computeDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const raw = policy.baseDelayMs * policy.factor ** (attempt - 1);
  const capped = Math.min(raw, policy.maxDelayMs);
  if (policy.jitter <= 0) return capped;
  const spread = capped * policy.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + spread));
}

/**
 * Rate limits, 5xx responses and network-level failures are transient.
 */
export function isTransientError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    if (typeof status === 'number') {
      return status === 408 || status === 429 || (status >= 500 && status < 600);
    }
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;
    const msg = error.message.toLowerCase();
    if (msg.includes('429') || msg.includes('rate limit')) return true;
    if (/\b5\d{2}\b/.test(msg)) return true;
    if (/econnreset|etimedout|econnrefused|fetch failed|socket hang up/.test(msg)) return true;
  }

  return false;
}

/**
 * Run an operation until it succeeds or the policy gives up.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const isRetryable = options.isRetryable ?? (() => true);
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError('Retry aborted');
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) throw error;

      const delayMs = computeDelay(policy, attempt, options.random);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, options.signal);
    }
  }
}
