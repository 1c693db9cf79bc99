/**
 * FeedRelay — Translation Service
 *
 * Entry point for every translation the pipeline needs.
 * Lookup order: cache → identical request already in flight → task queue.
 * Pairs listed in the cascade map go through an intermediate language.
 */

import type { ItemTranslationOutcome } from '../types/translation';
import { Semaphore, withTimeout } from '../lib/concurrency';
import {
  CancelledError,
  PipelineError,
  TimeoutError,
  TranslationServiceError,
  toErrorMessage,
} from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';
import { withRetry, type RetryPolicy } from '../lib/retry';
import { TranslationCache } from './cache';
import type { TranslationTaskQueue } from './task-queue';

// ============================================================
// TYPES
// ============================================================

export interface TranslationServiceConfig {
  enabled?: boolean;
  /** Requests waiting on the queue at once, across all pairs */
  maxConcurrent?: number;
  /** Deadline for one request, queue wait included */
  requestTimeoutMs?: number;
  /** Extra attempts per language in translateItem */
  maxRetries?: number;
  /** e.g. { "ru-de": "en" } translates ru→en→de */
  cascade?: Record<string, string>;
  retryPolicy?: Omit<RetryPolicy, 'maxAttempts'>;
}

export interface TranslationServiceDeps {
  queue: TranslationTaskQueue;
  cache: TranslationCache;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface TranslatableItem {
  newsId: string;
  title: string;
  content: string;
  language: string;
}

export interface TranslateOptions {
  signal?: AbortSignal;
  newsId?: string;
}

const DEFAULT_CONFIG: Required<TranslationServiceConfig> = {
  enabled: true,
  maxConcurrent: 3,
  requestTimeoutMs: 330_000,
  maxRetries: 2,
  cascade: {},
  retryPolicy: {
    baseDelayMs: 1_000,
    maxDelayMs: 10_000,
    factor: 2,
    jitter: 0.2,
  },
};

function normalizeLang(code: string): string {
  return code.trim().toLowerCase();
}

// ============================================================
// SERVICE
// ============================================================

export class TranslationService {
  private readonly config: Required<TranslationServiceConfig>;
  private readonly queue: TranslationTaskQueue;
  private readonly cache: TranslationCache;
  private readonly limiter: Semaphore;
  private readonly log: Logger;
  private readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(config: TranslationServiceConfig, deps: TranslationServiceDeps) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.queue = deps.queue;
    this.cache = deps.cache;
    this.limiter = new Semaphore(this.config.maxConcurrent);
    this.log = (deps.logger ?? rootLogger).child({ component: 'translation' });
    this.sleep = deps.sleep;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Translate one text. Same-language requests return the input.
   */
  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    options: TranslateOptions = {}
  ): Promise<string> {
    const source = normalizeLang(sourceLang);
    const target = normalizeLang(targetLang);

    if (source === target) return text;
    if (text.trim().length === 0) return '';

    const via = this.config.cascade[`${source}-${target}`];
    if (via && via !== source && via !== target) {
      const intermediate = await this.translate(text, source, via, options);
      return this.translate(intermediate, via, target, options);
    }

    const cached = this.cache.get(text, source, target);
    if (cached !== undefined) return cached;

    const key = TranslationCache.key(text, source, target);
    const shared = this.inFlight.get(key);
    if (shared) return shared;

    const request = this.requestTranslation(text, source, target, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  /**
   * Translate title and content into each target language. A language that
   * still fails after its retries is reported as failed; nothing is thrown.
   */
  async translateItem(
    item: TranslatableItem,
    targetLanguages: string[],
    signal?: AbortSignal
  ): Promise<Map<string, ItemTranslationOutcome>> {
    const outcomes = new Map<string, ItemTranslationOutcome>();
    if (!this.config.enabled) return outcomes;

    const source = normalizeLang(item.language);
    const targets = [...new Set(targetLanguages.map(normalizeLang))].filter((t) => t !== source);

    const results = await Promise.all(
      targets.map((target) => this.translateItemTo(item, source, target, signal))
    );
    for (const outcome of results) {
      outcomes.set(outcome.language, outcome);
    }
    return outcomes;
  }

  // ============ INTERNALS ============

  private async translateItemTo(
    item: TranslatableItem,
    source: string,
    target: string,
    signal?: AbortSignal
  ): Promise<ItemTranslationOutcome> {
    let attempts = 0;
    const options = { signal, newsId: item.newsId };

    try {
      const [title, content] = await withRetry(
        (attempt) => {
          attempts = attempt;
          return Promise.all([
            this.translate(item.title, source, target, options),
            this.translate(item.content, source, target, options),
          ]);
        },
        { ...this.config.retryPolicy, maxAttempts: this.config.maxRetries + 1 },
        {
          isRetryable: (error) => !(error instanceof CancelledError),
          signal,
          sleep: this.sleep,
          onRetry: (error, attempt, delayMs) =>
            this.log.debug('Retrying item translation', {
              newsId: item.newsId,
              target,
              attempt,
              delayMs,
              error: toErrorMessage(error),
            }),
        }
      );

      return { status: 'translated', language: target, title, content, attempts };
    } catch (error) {
      return { status: 'failed', language: target, error: toErrorMessage(error), attempts };
    }
  }

  private async requestTranslation(
    text: string,
    source: string,
    target: string,
    options: TranslateOptions
  ): Promise<string> {
    try {
      const translated = await this.limiter.run(async () => {
        const handle = await this.queue.enqueue({
          text,
          sourceLang: source,
          targetLang: target,
          newsId: options.newsId,
        });

        const onAbort = () => handle.cancel('Translation request aborted');
        options.signal?.addEventListener('abort', onAbort, { once: true });

        try {
          return await withTimeout(
            handle.result,
            this.config.requestTimeoutMs,
            `Translation ${source}->${target}`
          );
        } catch (error) {
          if (error instanceof TimeoutError) handle.cancel('Translation request timed out');
          throw error;
        } finally {
          options.signal?.removeEventListener('abort', onAbort);
        }
      }, options.signal);

      this.cache.set(text, source, target, translated);
      return translated;
    } catch (error) {
      if (error instanceof CancelledError || error instanceof TranslationServiceError) throw error;
      const message = error instanceof PipelineError ? `${error.code}: ${error.message}` : toErrorMessage(error);
      throw new TranslationServiceError(source, target, message, error);
    }
  }
}
