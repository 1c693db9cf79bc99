/**
 * FeedRelay — Feed Fetcher
 *
 * Downloads and parses feeds with bounded concurrency:
 * 1. Acquire a permit from the shared semaphore
 * 2. Download with a per-request timeout (retrying transient failures)
 * 3. Parse, clean and filter entries
 *
 * A failing feed produces an error outcome; it never throws.
 */

import type { FeedFetchOutcome, FeedSource, ParsedFeed, RawEntry } from '../types/feed';
import { Semaphore } from '../lib/concurrency';
import { FeedFetchError, toErrorMessage } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';
import { FETCH_RETRY, isTransientError, withRetry, type RetryPolicy } from '../lib/retry';
import { extractMedia } from './media';
import { parseFeedDocument, parsePublished } from './parser';
import { cleanHtml, countWords, resolveLink } from './text';

// ============================================================
// TYPES
// ============================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetcherConfig {
  /** Feeds downloaded at the same time */
  maxConcurrent?: number;
  /** Entries taken from the top of each feed */
  maxEntriesPerFeed?: number;
  requestTimeoutMs?: number;
  minTitleWords?: number;
  minContentWords?: number;
  userAgent?: string;
  maxVideoBytes?: number;
  retryPolicy?: RetryPolicy;
}

export interface FetcherDeps {
  fetchImpl?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_CONFIG: Required<FetcherConfig> = {
  maxConcurrent: 10,
  maxEntriesPerFeed: 50,
  requestTimeoutMs: 15_000,
  minTitleWords: 3,
  minContentWords: 10,
  userAgent: 'FeedRelay/0.1',
  maxVideoBytes: 50 * 1024 * 1024,
  retryPolicy: FETCH_RETRY,
};

const ACCEPT_HEADER =
  'application/rss+xml, application/atom+xml, application/rdf+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.5';

/**
 * Timeouts, network failures, 408, 429 and 5xx responses.
 */
export function isRetryableFetch(error: unknown): boolean {
  if (error instanceof FeedFetchError) {
    const status = error.status;
    return status === undefined || status === 408 || status === 429 || status >= 500;
  }
  return isTransientError(error);
}

// ============================================================
// FETCHER
// ============================================================

export class FeedFetcher {
  private readonly config: Required<FetcherConfig>;
  private readonly limiter: Semaphore;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(config: FetcherConfig = {}, deps: FetcherDeps = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.limiter = new Semaphore(this.config.maxConcurrent);
    this.fetchImpl = deps.fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = (deps.logger ?? rootLogger).child({ component: 'fetcher' });
    this.now = deps.now ?? (() => new Date());
  }

  /** Permits currently held, for diagnostics */
  get inFlight(): number {
    return this.limiter.inUse;
  }

  /**
   * Download a document body. Throws FeedFetchError on timeout, network
   * failure or a non-2xx status.
   */
  async download(url: string, signal?: AbortSignal, timeoutMs = this.config.requestTimeoutMs): Promise<string> {
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: ACCEPT_HEADER,
        },
        redirect: 'follow',
        signal: combined,
      });
    } catch (error) {
      if (timeoutSignal.aborted && !signal?.aborted) {
        throw new FeedFetchError(url, `timeout after ${timeoutMs}ms`, undefined, error);
      }
      throw new FeedFetchError(url, toErrorMessage(error), undefined, error);
    }

    if (!response.ok) {
      throw new FeedFetchError(url, `HTTP ${response.status}`, response.status);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new FeedFetchError(url, `body read failed: ${toErrorMessage(error)}`, undefined, error);
    }
  }

  /**
   * Fetch one feed. Holds a concurrency permit only while downloading.
   */
  async fetchFeed(feed: FeedSource, signal?: AbortSignal): Promise<FeedFetchOutcome> {
    const startTime = Date.now();

    try {
      const body = await this.limiter.run(
        () =>
          withRetry(() => this.download(feed.url, signal), this.config.retryPolicy, {
            isRetryable: isRetryableFetch,
            signal,
            onRetry: (error, attempt, delayMs) =>
              this.log.debug('Retrying feed download', {
                feedId: feed.id,
                attempt,
                delayMs,
                error: toErrorMessage(error),
              }),
          }),
        signal
      );

      const parsed = parseFeedDocument(body, feed.url);
      const { entries, skipped } = this.toEntries(parsed, feed);
      const durationMs = Date.now() - startTime;

      this.log.info('Feed fetched', {
        feedId: feed.id,
        format: parsed.format,
        entries: entries.length,
        skipped,
        durationMs,
      });

      return { ok: true, feed, entries, skipped, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const errorMessage = toErrorMessage(error);

      this.log.warn('Feed fetch failed', {
        feedId: feed.id,
        url: feed.url,
        error: errorMessage,
        durationMs,
      });

      return { ok: false, feed, error: errorMessage, durationMs };
    }
  }

  /**
   * Fetch many feeds. Outcomes come back in input order.
   */
  async fetchFeeds(feeds: FeedSource[], signal?: AbortSignal): Promise<FeedFetchOutcome[]> {
    return Promise.all(feeds.map((feed) => this.fetchFeed(feed, signal)));
  }

  // ============ ENTRY FILTERING ============

  private toEntries(parsed: ParsedFeed, feed: FeedSource): { entries: RawEntry[]; skipped: number } {
    const fetchedAt = this.now();
    const entries: RawEntry[] = [];
    let skipped = 0;

    for (const entry of parsed.entries.slice(0, this.config.maxEntriesPerFeed)) {
      const title = cleanHtml(entry.title);
      const content = cleanHtml(entry.body);
      const link = resolveLink(entry.link, feed.url);

      if (
        !link ||
        countWords(title) < this.config.minTitleWords ||
        countWords(content) < this.config.minContentWords
      ) {
        skipped++;
        continue;
      }

      const media = extractMedia(entry.node, { maxVideoBytes: this.config.maxVideoBytes });

      entries.push({
        feedId: feed.id,
        title,
        content,
        link,
        publishedAt: parsePublished(entry.published) ?? fetchedAt,
        imageUrl: media.imageUrl,
        videoUrl: media.videoUrl,
      });
    }

    return { entries, skipped };
  }
}
