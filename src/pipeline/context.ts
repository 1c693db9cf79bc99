/**
 * FeedRelay — Pipeline Context
 *
 * Builds every component the pipeline needs from a PipelineConfig.
 * Production clients are created unless an override is passed; tests pass
 * in-memory storage, embeddings, model loaders and channels.
 */

import type { PipelineConfig } from '../config';
import { channelLanguages } from '../config';
import type { StorageGateway } from '../db/gateway';
import { createStorageClient } from '../db/client';
import { SupabaseStorageGateway } from '../db/queries';
import { FeedFetcher, type FetchLike } from '../feeds/fetcher';
import { FeedValidator } from '../feeds/validator';
import { GeminiEmbeddingProvider, type EmbeddingProvider } from '../dedup/embeddings';
import { DuplicateDetector } from '../dedup/detector';
import { pairKey, type ModelLoader, type TranslationModel } from '../translation/model';
import { ModelManager } from '../translation/model-manager';
import { ClaudeModelLoader } from '../translation/models/anthropic';
import { createModelExecutor } from '../translation/executor';
import { TranslationTaskQueue } from '../translation/task-queue';
import { TranslationCache } from '../translation/cache';
import { TranslationService } from '../translation/service';
import { PublicationRateLimiter } from '../publishing/rate-limiter';
import type { PublicationChannel } from '../publishing/channel';
import { TelegramChannel } from '../publishing/telegram';
import type { Recipient } from '../types/news';
import { ConfigError, TranslationModelError } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface PipelineContext {
  config: PipelineConfig;
  logger: Logger;
  storage: StorageGateway;
  fetcher: FeedFetcher;
  validator: FeedValidator;
  detector: DuplicateDetector;
  models: ModelManager;
  queue: TranslationTaskQueue;
  translationCache: TranslationCache;
  translator: TranslationService;
  rateLimiter: PublicationRateLimiter;
  /** null when publishing is disabled */
  channel: PublicationChannel | null;
  /** Channel recipients, one per configured language */
  recipients: Recipient[];
}

export interface ContextOverrides {
  storage?: StorageGateway;
  embeddings?: EmbeddingProvider;
  modelLoader?: ModelLoader<TranslationModel>;
  channel?: PublicationChannel | null;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Stands in when translation is switched off; never asked to load.
 */
const disabledLoader: ModelLoader<TranslationModel> = {
  modelNameFor: pairKey,
  load: async (name) => {
    throw new TranslationModelError(name, 'translation is disabled');
  },
};

// ============================================================
// FACTORY
// ============================================================

export function channelRecipients(config: PipelineConfig): Recipient[] {
  return channelLanguages(config).flatMap((language) => {
    const id = config.publishing.channels[language];
    return id ? [{ type: 'channel' as const, id, language }] : [];
  });
}

export function createPipelineContext(
  config: PipelineConfig,
  overrides: ContextOverrides = {}
): PipelineContext {
  const log = overrides.logger ?? rootLogger;

  const storage = overrides.storage ?? new SupabaseStorageGateway(createStorageClient(config.storage));

  // ============ FEEDS ============

  const fetcher = new FeedFetcher(
    {
      maxConcurrent: config.rss.maxConcurrentFeeds,
      maxEntriesPerFeed: config.rss.maxEntriesPerFeed,
      requestTimeoutMs: config.rss.requestTimeoutMs,
      minTitleWords: config.rss.minTitleWords,
      minContentWords: config.rss.minContentWords,
      userAgent: config.rss.userAgent,
      maxVideoBytes: config.rss.maxVideoBytes,
    },
    { fetchImpl: overrides.fetchImpl, logger: log }
  );

  const validator = new FeedValidator(
    {
      timeoutMs: config.rss.requestTimeoutMs,
      cacheTtlMs: config.rss.validationCacheTtlMs,
    },
    { fetcher, logger: log }
  );

  // ============ DEDUP ============

  let embeddings = overrides.embeddings;
  if (!embeddings && config.dedup.enabled) {
    embeddings = new GeminiEmbeddingProvider({
      apiKey: config.dedup.geminiApiKey,
      model: config.dedup.embeddingModel,
      dimensions: config.dedup.embeddingDimensions,
    });
  }

  const detector = new DuplicateDetector(
    {
      enabled: config.dedup.enabled,
      similarityThreshold: config.dedup.similarityThreshold,
      adaptiveThreshold: config.dedup.adaptiveThreshold,
      lookbackHours: config.dedup.lookbackHours,
    },
    { storage, embeddings, logger: log }
  );

  // ============ TRANSLATION ============

  let loader: ModelLoader<TranslationModel> = disabledLoader;
  if (overrides.modelLoader) {
    loader = overrides.modelLoader;
  } else if (config.translation.enabled) {
    loader = new ClaudeModelLoader({
      apiKey: config.translation.anthropicApiKey,
      model: config.translation.model,
    });
  }

  const models = new ModelManager<TranslationModel>(
    {
      maxResident: config.translation.maxCachedModels,
      cleanupIntervalMs: config.translation.modelCleanupIntervalMs,
      loadTimeoutMs: config.translation.modelLoadTimeoutMs,
    },
    { loader, logger: log }
  );

  const queue = new TranslationTaskQueue(
    {
      maxSize: config.queue.maxSize,
      workers: config.queue.workers,
      taskTimeoutMs: config.queue.taskTimeoutMs,
      enqueueTimeoutMs: config.queue.enqueueTimeoutMs,
      maxBatchSize: config.queue.maxBatchSize,
    },
    { executor: createModelExecutor(models, loader), logger: log }
  );

  const translationCache = new TranslationCache({
    ttlMs: config.cache.ttlMs,
    maxSize: config.cache.maxSize,
    cleanupIntervalMs: config.cache.cleanupIntervalMs,
  });

  const translator = new TranslationService(
    {
      enabled: config.translation.enabled,
      maxConcurrent: config.translation.maxConcurrent,
      requestTimeoutMs: config.translation.requestTimeoutMs,
      maxRetries: config.translation.maxRetries,
      cascade: config.translation.cascade,
    },
    { queue, cache: translationCache, logger: log }
  );

  // ============ PUBLISHING ============

  const rateLimiter = new PublicationRateLimiter({ storage, logger: log });

  let channel: PublicationChannel | null = null;
  if (overrides.channel !== undefined) {
    channel = overrides.channel;
  } else if (config.publishing.enabled) {
    if (!config.publishing.telegramBotToken) {
      throw new ConfigError('TELEGRAM_BOT_TOKEN is required when PUBLISH_ENABLED is true');
    }
    channel = new TelegramChannel({ botToken: config.publishing.telegramBotToken }, { logger: log });
  }

  translationCache.startCleanup();
  models.startCleanup();

  return {
    config,
    logger: log,
    storage,
    fetcher,
    validator,
    detector,
    models,
    queue,
    translationCache,
    translator,
    rateLimiter,
    channel,
    recipients: channelRecipients(config),
  };
}
