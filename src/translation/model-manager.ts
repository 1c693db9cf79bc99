/**
 * FeedRelay — Model Manager
 *
 * Owns the resident translation models:
 * - loads lazily, one load per name no matter how many callers ask
 * - keeps at most `maxResident` models, evicting the least recently used
 * - unloads models that sat idle for longer than `idleTimeoutMs`
 *
 * Callers borrow a model through `withModel`. A model evicted while
 * borrowed is disposed when the last borrower returns it.
 */

import { CancelledError, TranslationModelError, toErrorMessage } from '../lib/errors';
import { withTimeout } from '../lib/concurrency';
import { logger as rootLogger, type Logger } from '../lib/logger';
import type { ModelLoader, TranslationModel } from './model';

// ============================================================
// TYPES
// ============================================================

export interface ModelManagerConfig {
  maxResident?: number;
  /** Sweep period for idle models; 0 disables the background sweep */
  cleanupIntervalMs?: number;
  /** Idle time after which a model is unloaded; defaults to twice the sweep period */
  idleTimeoutMs?: number;
  loadTimeoutMs?: number;
}

export interface ModelManagerDeps<M extends TranslationModel> {
  loader: ModelLoader<M>;
  logger?: Logger;
  now?: () => number;
}

export interface ModelManagerStats {
  resident: string[];
  loading: string[];
  loads: number;
  loadFailures: number;
  evictions: number;
  hits: number;
  misses: number;
}

interface ResidentModel<M> {
  name: string;
  model: M;
  lastUsed: number;
  leases: number;
  retired: boolean;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 1_800_000;

// ============================================================
// MANAGER
// ============================================================

export class ModelManager<M extends TranslationModel = TranslationModel> {
  private readonly maxResident: number;
  private readonly cleanupIntervalMs: number;
  private readonly idleTimeoutMs: number;
  private readonly loadTimeoutMs: number;
  private readonly loader: ModelLoader<M>;
  private readonly log: Logger;
  private readonly now: () => number;

  /** Map order is recency order: least recently used first */
  private readonly resident = new Map<string, ResidentModel<M>>();
  private readonly loading = new Map<string, Promise<ResidentModel<M>>>();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  private loads = 0;
  private loadFailures = 0;
  private evictions = 0;
  private hits = 0;
  private misses = 0;

  constructor(config: ModelManagerConfig, deps: ModelManagerDeps<M>) {
    this.maxResident = Math.max(1, config.maxResident ?? 15);
    this.cleanupIntervalMs = config.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.idleTimeoutMs = config.idleTimeoutMs ?? this.cleanupIntervalMs * 2;
    this.loadTimeoutMs = config.loadTimeoutMs ?? 60_000;
    this.loader = deps.loader;
    this.log = (deps.logger ?? rootLogger).child({ component: 'model-manager' });
    this.now = deps.now ?? Date.now;
  }

  get residentCount(): number {
    return this.resident.size;
  }

  isResident(name: string): boolean {
    return this.resident.has(name);
  }

  startCleanup(): void {
    if (this.cleanupTimer || this.cleanupIntervalMs <= 0) return;
    this.cleanupTimer = setInterval(() => {
      this.sweepIdle().catch((error: unknown) =>
        this.log.error('Idle model sweep failed', { error: toErrorMessage(error) })
      );
    }, this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  /**
   * Borrow a model for the duration of `use`, loading it first if needed.
   */
  async withModel<T>(name: string, use: (model: M) => Promise<T>): Promise<T> {
    const entry = await this.acquire(name);
    try {
      return await use(entry.model);
    } finally {
      await this.release(entry);
    }
  }

  /**
   * Resolve a model without holding a lease. The model may be evicted once
   * the caller yields; use withModel for work that spans awaits.
   */
  async getModel(name: string): Promise<M> {
    const entry = await this.acquire(name);
    await this.release(entry);
    return entry.model;
  }

  /**
   * Load models ahead of demand. Failures are logged, not thrown.
   */
  async preload(names: string[]): Promise<string[]> {
    const results = await Promise.allSettled(names.map((name) => this.ensureLoaded(name)));
    const loaded: string[] = [];
    results.forEach((result, i) => {
      const name = names[i] ?? '';
      if (result.status === 'fulfilled') {
        loaded.push(name);
      } else {
        this.log.warn('Model preload failed', { model: name, error: toErrorMessage(result.reason) });
      }
    });
    return loaded;
  }

  /**
   * Unload every idle model unused for longer than the idle timeout.
   */
  async sweepIdle(now: number = this.now()): Promise<string[]> {
    const expired = [...this.resident.values()].filter(
      (entry) => entry.leases === 0 && now - entry.lastUsed > this.idleTimeoutMs
    );
    for (const entry of expired) {
      await this.evict(entry, 'idle');
    }
    return expired.map((entry) => entry.name);
  }

  stats(): ModelManagerStats {
    return {
      resident: [...this.resident.keys()],
      loading: [...this.loading.keys()],
      loads: this.loads,
      loadFailures: this.loadFailures,
      evictions: this.evictions,
      hits: this.hits,
      misses: this.misses,
    };
  }

  /**
   * Stop the sweep, refuse new work and dispose every model.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    this.stopCleanup();
    await Promise.allSettled([...this.loading.values()]);
    for (const entry of [...this.resident.values()]) {
      await this.evict(entry, 'shutdown');
    }
  }

  // ============ INTERNALS ============

  private async acquire(name: string): Promise<ResidentModel<M>> {
    let missed = false;
    for (;;) {
      if (this.closed) {
        throw new CancelledError('Model manager is shut down');
      }

      const entry = this.resident.get(name);
      if (entry) {
        if (!missed) this.hits++;
        this.touch(entry);
        entry.leases++;
        return entry;
      }

      if (!missed) {
        this.misses++;
        missed = true;
      }
      // Loops because a fresh model can be evicted before this caller resumes
      await this.ensureLoaded(name);
    }
  }

  private async release(entry: ResidentModel<M>): Promise<void> {
    entry.leases--;
    entry.lastUsed = this.now();
    if (entry.retired && entry.leases === 0) {
      await this.disposeModel(entry);
    }
  }

  private touch(entry: ResidentModel<M>): void {
    entry.lastUsed = this.now();
    this.resident.delete(entry.name);
    this.resident.set(entry.name, entry);
  }

  private ensureLoaded(name: string): Promise<ResidentModel<M>> {
    const existing = this.resident.get(name);
    if (existing) return Promise.resolve(existing);

    const inFlight = this.loading.get(name);
    if (inFlight) return inFlight;

    const promise = this.load(name).finally(() => {
      this.loading.delete(name);
    });
    this.loading.set(name, promise);
    return promise;
  }

  private async load(name: string): Promise<ResidentModel<M>> {
    const startTime = Date.now();
    const controller = new AbortController();
    const pending = this.loader.load(name, controller.signal);

    let model: M;
    try {
      model = await withTimeout(pending, this.loadTimeoutMs, `Loading model ${name}`);
    } catch (error) {
      this.loadFailures++;
      controller.abort();
      // A load that finishes after its deadline still holds resources
      pending
        .then((late) => late.dispose())
        .catch((lateError: unknown) =>
          this.log.debug('Late model load discarded', { model: name, error: toErrorMessage(lateError) })
        );
      this.log.error('Model load failed', { model: name, error: toErrorMessage(error) });
      throw new TranslationModelError(name, `load failed: ${toErrorMessage(error)}`, error);
    }

    this.loads++;
    const entry: ResidentModel<M> = {
      name,
      model,
      lastUsed: this.now(),
      leases: 0,
      retired: false,
    };
    this.resident.set(name, entry);

    this.log.info('Model loaded', {
      model: name,
      durationMs: Date.now() - startTime,
      resident: this.resident.size,
    });

    await this.enforceCapacity(entry);
    return entry;
  }

  private async enforceCapacity(keep: ResidentModel<M>): Promise<void> {
    while (this.resident.size > this.maxResident) {
      const victim = [...this.resident.values()].find((entry) => entry !== keep);
      if (!victim) return;
      await this.evict(victim, 'capacity');
    }
  }

  private async evict(entry: ResidentModel<M>, reason: 'capacity' | 'idle' | 'shutdown'): Promise<void> {
    if (this.resident.get(entry.name) !== entry) return;

    this.resident.delete(entry.name);
    entry.retired = true;
    this.evictions++;

    this.log.info('Model evicted', { model: entry.name, reason, inUse: entry.leases > 0 });

    if (entry.leases === 0) {
      await this.disposeModel(entry);
    }
  }

  private async disposeModel(entry: ResidentModel<M>): Promise<void> {
    try {
      await entry.model.dispose();
    } catch (error) {
      this.log.error('Model dispose failed', { model: entry.name, error: toErrorMessage(error) });
    }
  }
}
