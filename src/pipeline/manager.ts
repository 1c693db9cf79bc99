/**
 * FeedRelay — RSS Manager
 *
 * Runs one pipeline pass over every active feed:
 * Fetching → Deduping → Persisting → Translating → Gating
 *
 * Feeds progress independently. Item- and feed-level failures end up in
 * the pass report; runOnce only rejects after shutdown.
 */

import { nanoid } from 'nanoid';
import type { FeedSource, FeedValidationResult, RawEntry } from '../types/feed';
import type { NewNewsItem, NewsItem, PendingItem, Recipient, Translation } from '../types/news';
import type { FeedPassReport, PassCounters, PassReport, RunOptions } from '../types/pipeline';
import { emptyCounters } from '../types/pipeline';
import { generateNewsId } from '../feeds/text';
import type { DuplicateVerdict } from '../dedup/detector';
import { CancelledError, toErrorMessage } from '../lib/errors';
import { withRetry, STORAGE_RETRY } from '../lib/retry';
import { timeOperation, type Logger } from '../lib/logger';
import type { PipelineContext } from './context';

// ============================================================
// TYPES
// ============================================================

interface PassState {
  passId: string;
  now: () => Date;
  publish: boolean;
  signal: AbortSignal;
}

/** Pending items read per feed and pass */
const PENDING_BATCH_SIZE = 20;
const HOUR_MS = 3_600_000;

function notCancelled(error: unknown): boolean {
  return !(error instanceof CancelledError);
}

const COUNTER_KEYS = [
  'fetched',
  'duplicates',
  'persisted',
  'persistFailures',
  'classifierFailures',
  'translated',
  'translationFallbacks',
  'published',
  'gated',
  'publishFailures',
] as const satisfies ReadonlyArray<keyof PassCounters>;

function sumCounters(reports: FeedPassReport[]): PassCounters {
  const totals = emptyCounters();
  for (const report of reports) {
    for (const key of COUNTER_KEYS) {
      totals[key] += report.counters[key];
    }
  }
  return totals;
}

function groupByLanguage(recipients: Recipient[]): Map<string, Recipient[]> {
  const groups = new Map<string, Recipient[]>();
  for (const recipient of recipients) {
    const group = groups.get(recipient.language) ?? [];
    group.push(recipient);
    groups.set(recipient.language, group);
  }
  return groups;
}

// ============================================================
// MANAGER
// ============================================================

export class RssManager {
  private readonly log: Logger;
  private readonly controller = new AbortController();
  private inFlight: Promise<PassReport> | null = null;
  private closed = false;

  constructor(private readonly ctx: PipelineContext) {
    this.log = ctx.logger.child({ component: 'rss-manager' });
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Run one pass. A call made while a pass is running gets that pass's report.
   */
  runOnce(options: RunOptions = {}): Promise<PassReport> {
    if (this.closed) {
      return Promise.reject(new CancelledError('Pipeline is shut down'));
    }
    if (this.inFlight) return this.inFlight;

    const pass = this.runPass(options).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pass;
    return pass;
  }

  validateFeed(url: string): Promise<FeedValidationResult> {
    return this.ctx.validator.validate(url, this.controller.signal);
  }

  /**
   * Abort in-flight work, stop the translation queue, unload models and
   * stop background sweeps.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort();

    await this.ctx.queue.shutdown();
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    await this.ctx.models.shutdown();
    this.ctx.translationCache.stopCleanup();
    this.log.info('Pipeline shut down');
  }

  // ============ PASS ============

  private async runPass(options: RunOptions): Promise<PassReport> {
    const now = options.now ?? (() => new Date());
    const startedAt = now();
    const start = Date.now();
    const state: PassState = {
      passId: nanoid(10),
      now,
      publish:
        (options.publish ?? true) && this.ctx.config.publishing.enabled && this.ctx.channel !== null,
      signal: this.controller.signal,
    };
    const log = this.log.child({ passId: state.passId });
    const errors: string[] = [];

    log.info('Pipeline pass started', { publish: state.publish });

    let feeds: FeedSource[] = [];
    try {
      feeds = await this.ctx.storage.listActiveFeeds();
    } catch (error) {
      const message = `listActiveFeeds: ${toErrorMessage(error)}`;
      errors.push(message);
      log.error('Failed to load feeds', { error: message });
    }

    if (feeds.length > 0) {
      await timeOperation('Duplicate index refresh', () => this.ctx.detector.refresh(now()), log);
    }

    const reports = await Promise.all(feeds.map((feed) => this.processFeed(feed, state, log)));
    const totals = sumCounters(reports);
    const finishedAt = now();

    const report: PassReport = {
      passId: state.passId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Date.now() - start,
      feeds: reports,
      totals,
      errors,
    };

    log.info('Pipeline pass completed', {
      feeds: feeds.length,
      failedFeeds: reports.filter((r) => !r.ok).length,
      durationMs: report.durationMs,
      ...totals,
    });

    return report;
  }

  private async processFeed(feed: FeedSource, state: PassState, passLog: Logger): Promise<FeedPassReport> {
    const log = passLog.child({ feedId: feed.id });
    const start = Date.now();
    const report: FeedPassReport = {
      feedId: feed.id,
      feedName: feed.name,
      stage: 'fetching',
      ok: true,
      counters: emptyCounters(),
      errors: [],
      durationMs: 0,
    };

    try {
      const outcome = await this.ctx.fetcher.fetchFeed(feed, state.signal);

      if (outcome.ok) {
        report.counters.fetched = outcome.entries.length;
        await this.markFetched(feed, state, report, log);

        const stored = await this.ingest(feed, outcome.entries, state, report, log);

        if (stored.length > 0 && !state.signal.aborted) {
          report.stage = 'translating';
          await Promise.all(stored.map((item) => this.translateItem(item, state, report, log)));
        }
      } else {
        report.ok = false;
        report.errors.push(outcome.error);
      }

      if (state.publish && !state.signal.aborted) {
        report.stage = 'gating';
        await this.gate(feed, state, report, log);
      }
    } catch (error) {
      report.ok = false;
      report.errors.push(toErrorMessage(error));
      log.error('Feed processing failed', { stage: report.stage, error: toErrorMessage(error) });
    }

    report.durationMs = Date.now() - start;
    return report;
  }

  private async markFetched(
    feed: FeedSource,
    state: PassState,
    report: FeedPassReport,
    log: Logger
  ): Promise<void> {
    try {
      await this.ctx.storage.markFeedFetched(feed.id, state.now());
    } catch (error) {
      report.errors.push(`markFeedFetched: ${toErrorMessage(error)}`);
      log.warn('Failed to record fetch time', { error: toErrorMessage(error) });
    }
  }

  // ============ DEDUP + PERSIST ============

  /**
   * Classify and store entries in document order. Returns the items stored
   * by this pass.
   */
  private async ingest(
    feed: FeedSource,
    entries: RawEntry[],
    state: PassState,
    report: FeedPassReport,
    log: Logger
  ): Promise<NewsItem[]> {
    const stored: NewsItem[] = [];

    for (const entry of entries) {
      if (state.signal.aborted) break;

      report.stage = 'deduping';
      const verdict = await this.ctx.detector.isDuplicate(entry);
      if (verdict.reason === 'classifier_error') {
        report.counters.classifierFailures++;
      }
      if (verdict.duplicate) {
        report.counters.duplicates++;
        continue;
      }

      report.stage = 'persisting';
      const item = await this.persist(feed, entry, verdict, state, report, log);
      if (item) stored.push(item);
    }

    return stored;
  }

  private async persist(
    feed: FeedSource,
    entry: RawEntry,
    verdict: DuplicateVerdict,
    state: PassState,
    report: FeedPassReport,
    log: Logger
  ): Promise<NewsItem | null> {
    const newItem: NewNewsItem = {
      newsId: generateNewsId(entry.title, entry.content, entry.link, feed.id),
      originalTitle: entry.title,
      originalContent: entry.content,
      originalLanguage: feed.language,
      categoryId: feed.categoryId,
      rssFeedId: feed.id,
      sourceUrl: entry.link,
      embedding: verdict.embedding ?? null,
      imageUrl: entry.imageUrl,
      videoUrl: entry.videoUrl,
      publishedAt: entry.publishedAt.toISOString(),
    };

    try {
      const { item, created } = await withRetry(
        () => this.ctx.storage.saveItem(newItem),
        { ...STORAGE_RETRY, maxAttempts: this.ctx.config.storage.maxAttempts },
        {
          isRetryable: notCancelled,
          signal: state.signal,
          onRetry: (error, attempt, delayMs) =>
            log.warn('Retrying item save', {
              newsId: newItem.newsId,
              attempt,
              delayMs,
              error: toErrorMessage(error),
            }),
        }
      );

      this.ctx.detector.remember(item.newsId, newItem.embedding);

      if (!created) {
        report.counters.duplicates++;
        return null;
      }

      report.counters.persisted++;
      return item;
    } catch (error) {
      const message = toErrorMessage(error);
      report.counters.persistFailures++;
      report.errors.push(`saveItem ${newItem.newsId}: ${message}`);
      log.error('Failed to persist item', {
        newsId: newItem.newsId,
        link: entry.link,
        error: message,
      });
      return null;
    }
  }

  // ============ TRANSLATE ============

  private async translateItem(
    item: NewsItem,
    state: PassState,
    report: FeedPassReport,
    log: Logger
  ): Promise<void> {
    const targets = this.ctx.recipients.map((r) => r.language);
    const outcomes = await this.ctx.translator.translateItem(
      {
        newsId: item.newsId,
        title: item.originalTitle,
        content: item.originalContent,
        language: item.originalLanguage,
      },
      targets,
      state.signal
    );

    for (const outcome of outcomes.values()) {
      if (outcome.status === 'failed') {
        report.counters.translationFallbacks++;
        log.warn('Translation failed, falling back to original', {
          newsId: item.newsId,
          language: outcome.language,
          attempts: outcome.attempts,
          error: outcome.error,
        });
        continue;
      }

      try {
        await withRetry(
          () =>
            this.ctx.storage.saveTranslation({
              newsId: item.newsId,
              language: outcome.language,
              translatedTitle: outcome.title,
              translatedContent: outcome.content,
            }),
          { ...STORAGE_RETRY, maxAttempts: this.ctx.config.storage.maxAttempts },
          { isRetryable: notCancelled, signal: state.signal }
        );
        report.counters.translated++;
      } catch (error) {
        report.errors.push(`saveTranslation ${item.newsId}/${outcome.language}: ${toErrorMessage(error)}`);
        log.error('Failed to save translation', {
          newsId: item.newsId,
          language: outcome.language,
          error: toErrorMessage(error),
        });
      }
    }
  }

  // ============ GATE + PUBLISH ============

  /**
   * Publish the feed's pending items, oldest first, while the rate limiter
   * admits them.
   */
  private async gate(feed: FeedSource, state: PassState, report: FeedPassReport, log: Logger): Promise<void> {
    const recipients = this.ctx.recipients;
    if (recipients.length === 0) return;

    const since = new Date(state.now().getTime() - this.ctx.config.publishing.backlogHours * HOUR_MS);
    const pending = await this.ctx.storage.listPendingItems(
      feed.id,
      since,
      recipients.map((r) => r.id),
      PENDING_BATCH_SIZE
    );

    for (const entry of pending) {
      if (state.signal.aborted) break;

      const missing = recipients.filter((r) => !entry.publishedRecipients.includes(r.id));
      if (missing.length === 0) continue;

      const admission = await this.ctx.rateLimiter.withAdmission(
        feed,
        () => this.publishItem(feed, entry, missing, state, report, log),
        state.now
      );

      if (!admission.admitted) {
        report.counters.gated++;
        break;
      }
    }
  }

  private async publishItem(
    feed: FeedSource,
    pending: PendingItem,
    recipients: Recipient[],
    state: PassState,
    report: FeedPassReport,
    log: Logger
  ): Promise<void> {
    const channel = this.ctx.channel;
    if (!channel) return;

    const { item } = pending;
    const translations = await this.ctx.storage.getTranslations(item.newsId);
    const byLanguage = new Map<string, Translation>(translations.map((t) => [t.language, t]));

    for (const [language, group] of groupByLanguage(recipients)) {
      const translation = language === item.originalLanguage ? null : (byLanguage.get(language) ?? null);
      const results = await channel.publish(item, translation, group, {
        categoryName: feed.categoryName,
        sourceName: feed.sourceName,
      });

      for (const result of results) {
        if (!result.ok) {
          report.counters.publishFailures++;
          report.errors.push(`publish ${item.newsId} → ${result.recipient.id}: ${result.error ?? 'unknown error'}`);
          continue;
        }

        try {
          await withRetry(
            () =>
              this.ctx.storage.recordPublication({
                newsId: item.newsId,
                translationId: translation?.id ?? null,
                recipientType: result.recipient.type,
                recipientId: result.recipient.id,
                messageId: result.messageId ?? null,
                language: translation ? translation.language : item.originalLanguage,
                sentAt: state.now().toISOString(),
              }),
            { ...STORAGE_RETRY, maxAttempts: this.ctx.config.storage.maxAttempts },
            { isRetryable: notCancelled, signal: state.signal }
          );
          report.counters.published++;
        } catch (error) {
          report.errors.push(`recordPublication ${item.newsId}: ${toErrorMessage(error)}`);
          log.error('Published item could not be recorded', {
            newsId: item.newsId,
            recipientId: result.recipient.id,
            error: toErrorMessage(error),
          });
        }
      }
    }

    log.info('Item published', {
      newsId: item.newsId,
      recipients: recipients.length,
      fallback: recipients.some((r) => r.language !== item.originalLanguage && !byLanguage.has(r.language)),
    });
  }
}
