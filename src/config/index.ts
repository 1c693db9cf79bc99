/**
 * FeedRelay — Configuration
 *
 * Reads the pipeline's settings from environment variables, validates them
 * with zod and converts second-based values into milliseconds.
 * Credentials stay optional here; the scripts that need them check for them.
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors';

// ============================================================
// SCHEMA HELPERS
// ============================================================

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

/**
 * JSON object of string values, e.g. '{"en":"@channel_en","ru":"@channel_ru"}'.
 */
const stringMap = (name: string) =>
  z
    .string()
    .default('{}')
    .transform((value, ctx) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(value);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be valid JSON` });
        return z.NEVER;
      }

      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a JSON object` });
        return z.NEVER;
      }

      const result: Record<string, string> = {};
      for (const [key, entry] of Object.entries(parsed)) {
        if (typeof entry !== 'string' && typeof entry !== 'number') {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${name} value for "${key}" must be a string`,
          });
          return z.NEVER;
        }
        result[key] = String(entry);
      }
      return result;
    });

const envSchema = z.object({
  // Storage
  SUPABASE_URL: optionalSecret,
  SUPABASE_SERVICE_ROLE_KEY: optionalSecret,

  // RSS
  RSS_MAX_CONCURRENT_FEEDS: positiveInt(10),
  RSS_MAX_ENTRIES_PER_FEED: positiveInt(50),
  RSS_VALIDATION_CACHE_TTL: positiveInt(300),
  RSS_REQUEST_TIMEOUT: positiveInt(15),
  RSS_MIN_TITLE_WORDS: nonNegativeInt(3),
  RSS_MIN_CONTENT_WORDS: nonNegativeInt(10),
  RSS_USER_AGENT: z.string().default('FeedRelay/0.1 (+https://example.org/feedrelay)'),
  MEDIA_MAX_VIDEO_BYTES: positiveInt(50 * 1024 * 1024),

  // Dedup
  DUPLICATE_DETECTOR_ENABLED: flag(true),
  DEDUP_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.95),
  DEDUP_ADAPTIVE_THRESHOLD: flag(true),
  DEDUP_LOOKBACK_HOURS: positiveInt(24),
  GEMINI_API_KEY: optionalSecret,
  EMBEDDING_MODEL: z.string().default('gemini-embedding-001'),
  EMBEDDING_DIMENSIONS: positiveInt(384),

  // Translation
  TRANSLATION_ENABLED: flag(true),
  TRANSLATION_MAX_CONCURRENT: positiveInt(3),
  TRANSLATION_MAX_CACHED_MODELS: positiveInt(15),
  TRANSLATION_MODEL_CLEANUP_INTERVAL: positiveInt(1800),
  TRANSLATION_MODEL_LOAD_TIMEOUT: positiveInt(60),
  TRANSLATION_REQUEST_TIMEOUT: positiveInt(330),
  TRANSLATION_MAX_RETRIES: nonNegativeInt(2),
  TRANSLATION_MODEL: z.string().default('claude-3-5-haiku-latest'),
  TRANSLATION_CASCADE: stringMap('TRANSLATION_CASCADE'),
  ANTHROPIC_API_KEY: optionalSecret,

  // Translation cache
  CACHE_DEFAULT_TTL: positiveInt(3600),
  CACHE_MAX_SIZE: positiveInt(10_000),
  CACHE_CLEANUP_INTERVAL: positiveInt(300),

  // Task queue
  QUEUE_MAX_SIZE: positiveInt(30),
  QUEUE_DEFAULT_WORKERS: positiveInt(1),
  QUEUE_TASK_TIMEOUT: positiveInt(300),
  QUEUE_ENQUEUE_TIMEOUT: nonNegativeInt(5),
  QUEUE_MAX_BATCH_SIZE: positiveInt(8),

  // Publishing
  PUBLISH_ENABLED: flag(true),
  TELEGRAM_BOT_TOKEN: optionalSecret,
  CHANNEL_IDS: stringMap('CHANNEL_IDS'),
  PUBLISH_BACKLOG_HOURS: positiveInt(24),

  // Persistence
  STORAGE_MAX_RETRIES: positiveInt(3),

  // Scheduling
  PIPELINE_CRON: z.string().default('*/3 * * * *'),
});

// ============================================================
// TYPES
// ============================================================

export interface PipelineConfig {
  storage: {
    url?: string;
    serviceRoleKey?: string;
    maxAttempts: number;
  };
  rss: {
    maxConcurrentFeeds: number;
    maxEntriesPerFeed: number;
    validationCacheTtlMs: number;
    requestTimeoutMs: number;
    minTitleWords: number;
    minContentWords: number;
    userAgent: string;
    maxVideoBytes: number;
  };
  dedup: {
    enabled: boolean;
    similarityThreshold: number;
    adaptiveThreshold: boolean;
    lookbackHours: number;
    geminiApiKey?: string;
    embeddingModel: string;
    embeddingDimensions: number;
  };
  translation: {
    enabled: boolean;
    maxConcurrent: number;
    maxCachedModels: number;
    modelCleanupIntervalMs: number;
    modelLoadTimeoutMs: number;
    requestTimeoutMs: number;
    maxRetries: number;
    model: string;
    cascade: Record<string, string>;
    anthropicApiKey?: string;
  };
  cache: {
    ttlMs: number;
    maxSize: number;
    cleanupIntervalMs: number;
  };
  queue: {
    maxSize: number;
    workers: number;
    taskTimeoutMs: number;
    enqueueTimeoutMs: number;
    maxBatchSize: number;
  };
  publishing: {
    enabled: boolean;
    telegramBotToken?: string;
    channels: Record<string, string>;
    backlogHours: number;
  };
  schedule: {
    cron: string;
  };
}

// ============================================================
// LOADER
// ============================================================

/**
 * Load and validate configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = result.data;
  const seconds = (value: number) => value * 1000;

  return {
    storage: {
      url: e.SUPABASE_URL,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      maxAttempts: e.STORAGE_MAX_RETRIES,
    },
    rss: {
      maxConcurrentFeeds: e.RSS_MAX_CONCURRENT_FEEDS,
      maxEntriesPerFeed: e.RSS_MAX_ENTRIES_PER_FEED,
      validationCacheTtlMs: seconds(e.RSS_VALIDATION_CACHE_TTL),
      requestTimeoutMs: seconds(e.RSS_REQUEST_TIMEOUT),
      minTitleWords: e.RSS_MIN_TITLE_WORDS,
      minContentWords: e.RSS_MIN_CONTENT_WORDS,
      userAgent: e.RSS_USER_AGENT,
      maxVideoBytes: e.MEDIA_MAX_VIDEO_BYTES,
    },
    dedup: {
      enabled: e.DUPLICATE_DETECTOR_ENABLED,
      similarityThreshold: e.DEDUP_SIMILARITY_THRESHOLD,
      adaptiveThreshold: e.DEDUP_ADAPTIVE_THRESHOLD,
      lookbackHours: e.DEDUP_LOOKBACK_HOURS,
      geminiApiKey: e.GEMINI_API_KEY,
      embeddingModel: e.EMBEDDING_MODEL,
      embeddingDimensions: e.EMBEDDING_DIMENSIONS,
    },
    translation: {
      enabled: e.TRANSLATION_ENABLED,
      maxConcurrent: e.TRANSLATION_MAX_CONCURRENT,
      maxCachedModels: e.TRANSLATION_MAX_CACHED_MODELS,
      modelCleanupIntervalMs: seconds(e.TRANSLATION_MODEL_CLEANUP_INTERVAL),
      modelLoadTimeoutMs: seconds(e.TRANSLATION_MODEL_LOAD_TIMEOUT),
      requestTimeoutMs: seconds(e.TRANSLATION_REQUEST_TIMEOUT),
      maxRetries: e.TRANSLATION_MAX_RETRIES,
      model: e.TRANSLATION_MODEL,
      cascade: e.TRANSLATION_CASCADE,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
    },
    cache: {
      ttlMs: seconds(e.CACHE_DEFAULT_TTL),
      maxSize: e.CACHE_MAX_SIZE,
      cleanupIntervalMs: seconds(e.CACHE_CLEANUP_INTERVAL),
    },
    queue: {
      maxSize: e.QUEUE_MAX_SIZE,
      workers: e.QUEUE_DEFAULT_WORKERS,
      taskTimeoutMs: seconds(e.QUEUE_TASK_TIMEOUT),
      enqueueTimeoutMs: seconds(e.QUEUE_ENQUEUE_TIMEOUT),
      maxBatchSize: e.QUEUE_MAX_BATCH_SIZE,
    },
    publishing: {
      enabled: e.PUBLISH_ENABLED,
      telegramBotToken: e.TELEGRAM_BOT_TOKEN,
      channels: e.CHANNEL_IDS,
      backlogHours: e.PUBLISH_BACKLOG_HOURS,
    },
    schedule: {
      cron: e.PIPELINE_CRON,
    },
  };
}

/**
 * Channel languages in a stable order; items are translated into each of them.
 */
export function channelLanguages(config: PipelineConfig): string[] {
  return Object.keys(config.publishing.channels).sort();
}
