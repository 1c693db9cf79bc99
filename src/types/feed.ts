/**
 * FeedRelay — Feed Types
 *
 * Feed configuration as stored, and entries as they come off the wire.
 */

// ============================================================
// FEED SOURCE
// ============================================================

/**
 * A configured feed. Read-only to the pipeline except `lastFetchedAt`.
 */
export interface FeedSource {
  id: number;
  sourceId: number | null;
  name: string;
  url: string;
  /** ISO 639-1 code of the feed's content */
  language: string;
  categoryId: number | null;
  categoryName: string | null;
  sourceName: string | null;
  cooldownMinutes: number;
  maxNewsPerHour: number;
  isActive: boolean;
  lastFetchedAt: string | null;
}

export const DEFAULT_COOLDOWN_MINUTES = 10;
export const DEFAULT_MAX_NEWS_PER_HOUR = 10;

// ============================================================
// RAW ENTRY
// ============================================================

/**
 * One parsed feed entry. Transient; never stored as-is.
 */
export interface RawEntry {
  feedId: number;
  title: string;
  /** Cleaned plain text */
  content: string;
  link: string;
  publishedAt: Date;
  imageUrl: string | null;
  videoUrl: string | null;
}

export type FeedFormat = 'rss' | 'atom' | 'rdf';

export interface ParsedFeed {
  format: FeedFormat;
  title: string | null;
  entries: ParsedFeedEntry[];
}

/**
 * Entry fields pulled from the XML tree, before cleaning and filtering.
 */
export interface ParsedFeedEntry {
  title: string;
  /** HTML or text, as published */
  body: string;
  link: string | null;
  published: string | null;
  /** The raw parsed node, for media extraction */
  node: Record<string, unknown>;
}

// ============================================================
// OUTCOMES
// ============================================================

export type FeedFetchOutcome =
  | { ok: true; feed: FeedSource; entries: RawEntry[]; skipped: number; durationMs: number }
  | { ok: false; feed: FeedSource; error: string; durationMs: number };

export interface FeedValidationResult {
  ok: boolean;
  reason: string;
  format?: FeedFormat;
  entryCount?: number;
  cached: boolean;
}
