/**
 * FeedRelay — Feed Validator
 *
 * Answers "is this URL a usable feed?" for feed registration.
 * Verdicts, positive or negative, are cached per URL. Downloads that still
 * fail transiently after retrying are reported but not cached.
 */

import type { FeedValidationResult } from '../types/feed';
import { TtlCache } from '../lib/cache';
import { toErrorMessage } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';
import { FETCH_RETRY, withRetry, type RetryPolicy } from '../lib/retry';
import { FeedFetcher, isRetryableFetch } from './fetcher';
import { parseFeedDocument } from './parser';
import { isHttpUrl } from './text';

export interface ValidatorConfig {
  timeoutMs?: number;
  cacheTtlMs?: number;
  maxCachedUrls?: number;
  retryPolicy?: RetryPolicy;
}

export interface ValidatorDeps {
  fetcher?: FeedFetcher;
  logger?: Logger;
  now?: () => number;
}

type Verdict = Omit<FeedValidationResult, 'cached'>;

interface CheckOutcome {
  verdict: Verdict;
  transient: boolean;
}

const DEFAULT_CONFIG: Required<ValidatorConfig> = {
  timeoutMs: 10_000,
  cacheTtlMs: 300_000,
  maxCachedUrls: 1_000,
  retryPolicy: FETCH_RETRY,
};

export class FeedValidator {
  private readonly config: Required<ValidatorConfig>;
  private readonly fetcher: FeedFetcher;
  private readonly cache: TtlCache<string, Verdict>;
  private readonly log: Logger;

  constructor(config: ValidatorConfig = {}, deps: ValidatorDeps = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fetcher = deps.fetcher ?? new FeedFetcher();
    this.log = (deps.logger ?? rootLogger).child({ component: 'validator' });
    this.cache = new TtlCache({
      ttlMs: this.config.cacheTtlMs,
      maxSize: this.config.maxCachedUrls,
      now: deps.now,
    });
  }

  async validate(url: string, signal?: AbortSignal): Promise<FeedValidationResult> {
    const target = url.trim();
    if (!isHttpUrl(target)) {
      return { ok: false, reason: 'URL must use http or https', cached: false };
    }

    const cached = this.cache.get(target);
    if (cached) {
      return { ...cached, cached: true };
    }

    const { verdict, transient } = await this.check(target, signal);
    // Transient failures and shutdown say nothing lasting about the feed
    if (!transient && !signal?.aborted) {
      this.cache.set(target, verdict);
    }

    this.log.info('Feed validated', { url: target, ok: verdict.ok, reason: verdict.reason });
    return { ...verdict, cached: false };
  }

  private async check(url: string, signal?: AbortSignal): Promise<CheckOutcome> {
    let body: string;
    try {
      body = await withRetry(
        () => this.fetcher.download(url, signal, this.config.timeoutMs),
        this.config.retryPolicy,
        {
          isRetryable: isRetryableFetch,
          signal,
          onRetry: (error, attempt, delayMs) =>
            this.log.debug('Retrying feed validation', {
              url,
              attempt,
              delayMs,
              error: toErrorMessage(error),
            }),
        }
      );
    } catch (error) {
      return {
        verdict: { ok: false, reason: `unreachable: ${toErrorMessage(error)}` },
        transient: isRetryableFetch(error),
      };
    }

    try {
      const parsed = parseFeedDocument(body, url);
      if (parsed.entries.length === 0) {
        return {
          verdict: { ok: false, reason: 'feed has no entries', format: parsed.format, entryCount: 0 },
          transient: false,
        };
      }
      return {
        verdict: { ok: true, reason: 'valid', format: parsed.format, entryCount: parsed.entries.length },
        transient: false,
      };
    } catch (error) {
      return { verdict: { ok: false, reason: `unparseable: ${toErrorMessage(error)}` }, transient: false };
    }
  }
}
