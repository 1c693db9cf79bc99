/**
 * FeedRelay — Translation Types
 */

export interface LanguagePair {
  source: string;
  target: string;
}

export interface TranslationPayload {
  text: string;
  sourceLang: string;
  targetLang: string;
  /** For log correlation only */
  newsId?: string;
}

export type TaskState = 'queued' | 'running' | 'done' | 'failed' | 'cancelled';

export interface TranslationTask {
  id: string;
  payload: TranslationPayload;
  /** Higher runs first */
  priority: number;
  state: TaskState;
  attempts: number;
  enqueuedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
}

export interface TaskHandle {
  readonly id: string;
  readonly state: TaskState;
  readonly result: Promise<string>;
  cancel(reason?: string): boolean;
}

export interface QueueStats {
  queued: number;
  running: number;
  processed: number;
  failed: number;
  cancelled: number;
  rejected: number;
  batches: number;
}

export type ItemTranslationOutcome =
  | { status: 'translated'; language: string; title: string; content: string; attempts: number }
  | { status: 'failed'; language: string; error: string; attempts: number };
