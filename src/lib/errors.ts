/**
 * FeedRelay — Errors
 *
 * Every failure the pipeline reasons about carries a stable code.
 * Components convert these into typed outcomes before they reach
 * the orchestrator.
 */

export type ErrorCode =
  | 'FEED_FETCH'
  | 'FEED_PARSE'
  | 'EMBEDDING'
  | 'STORAGE'
  | 'TRANSLATION_MODEL'
  | 'TRANSLATION_SERVICE'
  | 'QUEUE_FULL'
  | 'QUEUE_CLOSED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'PUBLISH'
  | 'CONFIG';

export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

// ============================================================
// FEEDS
// ============================================================

export class FeedFetchError extends PipelineError {
  readonly status?: number;

  constructor(url: string, message: string, status?: number, cause?: unknown) {
    super('FEED_FETCH', `Failed to fetch ${url}: ${message}`, { url, status }, { cause });
    this.status = status;
  }
}

export class FeedParseError extends PipelineError {
  constructor(url: string, message: string, cause?: unknown) {
    super('FEED_PARSE', `Failed to parse ${url}: ${message}`, { url }, { cause });
  }
}

// ============================================================
// DEDUP / STORAGE
// ============================================================

export class EmbeddingError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('EMBEDDING', message, {}, { cause });
  }
}

export class StorageError extends PipelineError {
  constructor(operation: string, message: string, code?: string) {
    super('STORAGE', `Storage ${operation} failed: ${message}`, { operation, code });
  }
}

// ============================================================
// TRANSLATION
// ============================================================

export class TranslationModelError extends PipelineError {
  constructor(modelName: string, message: string, cause?: unknown) {
    super('TRANSLATION_MODEL', `Model ${modelName}: ${message}`, { modelName }, { cause });
  }
}

export class TranslationServiceError extends PipelineError {
  constructor(sourceLang: string, targetLang: string, message: string, cause?: unknown) {
    super(
      'TRANSLATION_SERVICE',
      `Translation ${sourceLang}->${targetLang} failed: ${message}`,
      { sourceLang, targetLang },
      { cause }
    );
  }
}

export class QueueFullError extends PipelineError {
  constructor(maxSize: number, waitedMs: number) {
    super('QUEUE_FULL', `Task queue is full (${maxSize} tasks)`, { maxSize, waitedMs });
  }
}

export class QueueClosedError extends PipelineError {
  constructor() {
    super('QUEUE_CLOSED', 'Task queue is shut down');
  }
}

// ============================================================
// GENERAL
// ============================================================

export class TimeoutError extends PipelineError {
  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
  }
}

export class CancelledError extends PipelineError {
  constructor(reason = 'Operation cancelled') {
    super('CANCELLED', reason);
  }
}

export class PublishError extends PipelineError {
  constructor(recipientId: string, message: string, cause?: unknown) {
    super('PUBLISH', `Publish to ${recipientId} failed: ${message}`, { recipientId }, { cause });
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super('CONFIG', message, { issues });
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
