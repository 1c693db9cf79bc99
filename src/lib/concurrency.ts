/**
 * FeedRelay — Concurrency primitives
 *
 * Semaphore for bounded fan-out, keyed mutex for per-key serialization,
 * and timeout helpers.
 */

import { CancelledError, TimeoutError } from './errors';

// ============================================================
// TIMING
// ============================================================

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Sleep aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Sleep aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against a deadline. The timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================
// SEMAPHORE
// ============================================================

interface Waiter {
  resolve: (release: () => void) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class Semaphore {
  private permits: number;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.permits = capacity;
  }

  get available(): number {
    return this.permits;
  }

  get inUse(): number {
    return this.capacity - this.permits;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a permit. The returned function releases it and is safe to call twice.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Semaphore acquire aborted'));
    }

    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(new CancelledError('Semaphore acquire aborted'));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.dispatch();
    };
  }

  private dispatch(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.permits++;
      return;
    }
    if (next.signal && next.onAbort) {
      next.signal.removeEventListener('abort', next.onAbort);
    }
    // The permit passes straight to the next waiter
    next.resolve(this.releaser());
  }
}

// ============================================================
// KEYED MUTEX
// ============================================================

/**
 * Serializes async sections per key. Keys with nothing queued are dropped.
 */
export class KeyedMutex<K = string> {
  private readonly tails = new Map<K, Promise<void>>();

  get activeKeys(): number {
    return this.tails.size;
  }

  async runExclusive<T>(key: K, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
