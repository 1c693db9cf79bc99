/**
 * FeedRelay — Pipeline Types
 *
 * Per-pass reporting. A pass never throws for feed- or item-level
 * failures; everything lands in the report.
 */

export type PipelineStage =
  | 'idle'
  | 'fetching'
  | 'deduping'
  | 'persisting'
  | 'translating'
  | 'gating';

export interface PassCounters {
  fetched: number;
  duplicates: number;
  persisted: number;
  persistFailures: number;
  classifierFailures: number;
  translated: number;
  translationFallbacks: number;
  published: number;
  gated: number;
  publishFailures: number;
}

export interface FeedPassReport {
  feedId: number;
  feedName: string;
  /** Last stage the feed reached */
  stage: PipelineStage;
  ok: boolean;
  counters: PassCounters;
  errors: string[];
  durationMs: number;
}

export interface PassReport {
  passId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  feeds: FeedPassReport[];
  totals: PassCounters;
  errors: string[];
}

export interface RunOptions {
  /** false skips the gating stage (dry run) */
  publish?: boolean;
  now?: () => Date;
}

export function emptyCounters(): PassCounters {
  return {
    fetched: 0,
    duplicates: 0,
    persisted: 0,
    persistFailures: 0,
    classifierFailures: 0,
    translated: 0,
    translationFallbacks: 0,
    published: 0,
    gated: 0,
    publishFailures: 0,
  };
}
