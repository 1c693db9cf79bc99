/**
 * FeedRelay — Translation Task Queue
 *
 * Bounded queue in front of the translation models.
 * - Enqueue waits a bounded time for space, then fails with QueueFullError
 * - A fixed pool of workers takes the highest-priority, oldest task and
 *   batches it with queued tasks for the same language pair
 * - Every execution has a deadline; running tasks can be cancelled
 */

import { nanoid } from 'nanoid';
import type {
  QueueStats,
  TaskHandle,
  TaskState,
  TranslationPayload,
  TranslationTask,
} from '../types/translation';
import { withTimeout } from '../lib/concurrency';
import {
  CancelledError,
  QueueClosedError,
  QueueFullError,
  TranslationServiceError,
  toErrorMessage,
} from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

/**
 * Translates a batch of payloads that share one language pair.
 * Must return one result per payload, in order.
 */
export type BatchExecutor = (payloads: TranslationPayload[], signal: AbortSignal) => Promise<string[]>;

export interface TaskQueueConfig {
  maxSize?: number;
  workers?: number;
  taskTimeoutMs?: number;
  /** Default wait for space when the queue is full */
  enqueueTimeoutMs?: number;
  maxBatchSize?: number;
}

export interface TaskQueueDeps {
  executor: BatchExecutor;
  logger?: Logger;
  now?: () => number;
}

export interface EnqueueOptions {
  priority?: number;
  /** Overrides the configured wait for space */
  waitMs?: number;
}

interface QueuedTask {
  task: TranslationTask;
  resolve: (text: string) => void;
  reject: (error: unknown) => void;
  batch: RunningBatch | null;
}

interface RunningBatch {
  controller: AbortController;
  tasks: QueuedTask[];
}

interface SpaceWaiter {
  resolve: () => void;
  reject: (error: unknown) => void;
  timer: ReturnType<typeof setTimeout>;
}

const DEFAULT_CONFIG: Required<TaskQueueConfig> = {
  maxSize: 30,
  workers: 1,
  taskTimeoutMs: 300_000,
  enqueueTimeoutMs: 5_000,
  maxBatchSize: 8,
};

// ============================================================
// QUEUE
// ============================================================

export class TranslationTaskQueue {
  private readonly config: Required<TaskQueueConfig>;
  private readonly executor: BatchExecutor;
  private readonly log: Logger;
  private readonly now: () => number;

  private readonly pending: QueuedTask[] = [];
  private readonly running = new Set<RunningBatch>();
  private readonly spaceWaiters: SpaceWaiter[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly wakeups: Array<() => void> = [];
  private workers: Promise<void>[] = [];
  private closed = false;
  /** Slots promised to woken waiters that have not inserted yet */
  private reserved = 0;

  private processed = 0;
  private failed = 0;
  private cancelled = 0;
  private rejected = 0;
  private batches = 0;

  constructor(config: TaskQueueConfig, deps: TaskQueueDeps) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.executor = deps.executor;
    this.log = (deps.logger ?? rootLogger).child({ component: 'task-queue' });
    this.now = deps.now ?? Date.now;
  }

  get size(): number {
    return this.pending.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Workers start on first use; calling again is a no-op */
  start(): void {
    if (this.workers.length > 0 || this.closed) return;
    for (let i = 0; i < this.config.workers; i++) {
      this.workers.push(this.workerLoop(i));
    }
    this.log.debug('Task queue started', { workers: this.config.workers });
  }

  /**
   * Add a task. Waits at most `waitMs` for space, then throws QueueFullError.
   */
  async enqueue(payload: TranslationPayload, options: EnqueueOptions = {}): Promise<TaskHandle> {
    if (this.closed) throw new QueueClosedError();
    this.start();

    if (this.pending.length + this.reserved >= this.config.maxSize) {
      await this.waitForSpace(options.waitMs ?? this.config.enqueueTimeoutMs);
      this.reserved--;
      if (this.closed) throw new QueueClosedError();
    }

    const task: TranslationTask = {
      id: nanoid(),
      payload,
      priority: options.priority ?? 0,
      state: 'queued',
      attempts: 0,
      enqueuedAt: this.now(),
      startedAt: null,
      finishedAt: null,
    };

    let resolve: (text: string) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const result = new Promise<string>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    // Callers that cancel may never await the result
    void result.catch((error: unknown) =>
      this.log.debug('Task settled with error', { taskId: task.id, error: toErrorMessage(error) })
    );

    const queued: QueuedTask = { task, resolve, reject, batch: null };
    this.insertByPriority(queued);
    this.wakeWorker();

    return {
      id: task.id,
      get state(): TaskState {
        return task.state;
      },
      result,
      cancel: (reason?: string) => this.cancel(queued, reason),
    };
  }

  /**
   * Resolve once nothing is queued or running.
   */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Refuse new work, cancel queued tasks, abort running ones and wait for
   * the workers to exit.
   */
  async shutdown(): Promise<void> {
    if (this.closed) {
      await Promise.all(this.workers);
      return;
    }
    this.closed = true;

    for (const waiter of this.spaceWaiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new QueueClosedError());
    }

    for (const queued of this.pending.splice(0)) {
      this.settleCancelled(queued, 'Task queue shut down');
    }

    for (const batch of this.running) {
      for (const queued of batch.tasks) {
        this.settleCancelled(queued, 'Task queue shut down');
      }
      batch.controller.abort();
    }

    for (const wake of this.wakeups.splice(0)) wake();
    await Promise.all(this.workers);
    this.notifyIdle();

    this.log.info('Task queue stopped', { ...this.stats() });
  }

  stats(): QueueStats {
    let running = 0;
    for (const batch of this.running) {
      running += batch.tasks.filter((t) => t.task.state === 'running').length;
    }
    return {
      queued: this.pending.length,
      running,
      processed: this.processed,
      failed: this.failed,
      cancelled: this.cancelled,
      rejected: this.rejected,
      batches: this.batches,
    };
  }

  // ============ ENQUEUE HELPERS ============

  private waitForSpace(waitMs: number): Promise<void> {
    if (waitMs <= 0) {
      this.rejected++;
      return Promise.reject(new QueueFullError(this.config.maxSize, 0));
    }

    return new Promise((resolve, reject) => {
      const waiter: SpaceWaiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.spaceWaiters.indexOf(waiter);
          if (index >= 0) this.spaceWaiters.splice(index, 1);
          this.rejected++;
          reject(new QueueFullError(this.config.maxSize, waitMs));
        }, waitMs),
      };
      this.spaceWaiters.push(waiter);
    });
  }

  private releaseSpace(): void {
    while (this.spaceWaiters.length > 0 && this.pending.length + this.reserved < this.config.maxSize) {
      const waiter = this.spaceWaiters.shift();
      if (!waiter) break;
      clearTimeout(waiter.timer);
      this.reserved++;
      waiter.resolve();
    }
  }

  private insertByPriority(queued: QueuedTask): void {
    const index = this.pending.findIndex((other) => other.task.priority < queued.task.priority);
    if (index === -1) this.pending.push(queued);
    else this.pending.splice(index, 0, queued);
  }

  private cancel(queued: QueuedTask, reason = 'Task cancelled'): boolean {
    const { state } = queued.task;
    if (state !== 'queued' && state !== 'running') return false;

    if (state === 'queued') {
      const index = this.pending.indexOf(queued);
      if (index >= 0) this.pending.splice(index, 1);
      this.releaseSpace();
    }

    this.settleCancelled(queued, reason);

    const batch = queued.batch;
    if (batch && batch.tasks.every((t) => t.task.state === 'cancelled')) {
      batch.controller.abort();
    }

    this.notifyIdle();
    return true;
  }

  private settleCancelled(queued: QueuedTask, reason: string): void {
    if (queued.task.state === 'cancelled' || queued.task.state === 'done' || queued.task.state === 'failed') {
      return;
    }
    queued.task.state = 'cancelled';
    queued.task.finishedAt = this.now();
    this.cancelled++;
    queued.reject(new CancelledError(reason));
  }

  // ============ WORKERS ============

  private wakeWorker(): void {
    const wake = this.wakeups.shift();
    if (wake) wake();
  }

  private async workerLoop(workerId: number): Promise<void> {
    while (!this.closed) {
      const batch = this.takeBatch();
      if (!batch) {
        this.notifyIdle();
        await new Promise<void>((resolve) => this.wakeups.push(resolve));
        continue;
      }
      await this.runBatch(batch, workerId);
    }
  }

  /**
   * Highest-priority task plus queued tasks for the same pair.
   */
  private takeBatch(): RunningBatch | null {
    const first = this.pending.shift();
    if (!first) return null;

    const { sourceLang, targetLang } = first.task.payload;
    const tasks = [first];

    for (let i = 0; i < this.pending.length && tasks.length < this.config.maxBatchSize; ) {
      const candidate = this.pending[i];
      if (
        candidate &&
        candidate.task.payload.sourceLang === sourceLang &&
        candidate.task.payload.targetLang === targetLang
      ) {
        tasks.push(candidate);
        this.pending.splice(i, 1);
      } else {
        i++;
      }
    }

    const batch: RunningBatch = { controller: new AbortController(), tasks };
    const startedAt = this.now();
    for (const queued of tasks) {
      queued.batch = batch;
      queued.task.state = 'running';
      queued.task.attempts++;
      queued.task.startedAt = startedAt;
    }

    this.releaseSpace();
    return batch;
  }

  private async runBatch(batch: RunningBatch, workerId: number): Promise<void> {
    this.running.add(batch);
    this.batches++;
    const first = batch.tasks[0]?.task.payload;

    try {
      const results = await withTimeout(
        this.executor(
          batch.tasks.map((t) => t.task.payload),
          batch.controller.signal
        ),
        this.config.taskTimeoutMs,
        'Translation batch'
      );

      if (results.length !== batch.tasks.length) {
        throw new TranslationServiceError(
          first?.sourceLang ?? '?',
          first?.targetLang ?? '?',
          `expected ${batch.tasks.length} results, got ${results.length}`
        );
      }

      batch.tasks.forEach((queued, i) => {
        if (queued.task.state !== 'running') return;
        queued.task.state = 'done';
        queued.task.finishedAt = this.now();
        this.processed++;
        queued.resolve(results[i] ?? '');
      });
    } catch (error) {
      batch.controller.abort();
      this.log.debug('Translation batch failed', {
        workerId,
        size: batch.tasks.length,
        pair: first ? `${first.sourceLang}-${first.targetLang}` : undefined,
        error: toErrorMessage(error),
      });

      for (const queued of batch.tasks) {
        if (queued.task.state !== 'running') continue;
        queued.task.state = 'failed';
        queued.task.finishedAt = this.now();
        this.failed++;
        queued.reject(error);
      }
    } finally {
      this.running.delete(batch);
    }
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.running.size === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}
