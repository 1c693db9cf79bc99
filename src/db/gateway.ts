/**
 * FeedRelay — Storage Gateway
 *
 * Everything the pipeline reads from or writes to the database goes
 * through this interface. The Supabase implementation lives in ./queries;
 * tests use an in-memory one.
 */

import type { FeedSource } from '../types/feed';
import type {
  NewNewsItem,
  NewPublicationRecord,
  NewTranslation,
  NewsItem,
  PendingItem,
  PublicationRecord,
  StoredEmbedding,
  Translation,
} from '../types/news';

export interface SaveItemResult {
  item: NewsItem;
  /** false when an item with the same id already existed */
  created: boolean;
}

export interface StorageGateway {
  // ============ FEEDS ============

  listActiveFeeds(): Promise<FeedSource[]>;
  markFeedFetched(feedId: number, at: Date): Promise<void>;

  // ============ ITEMS ============

  /** Idempotent on newsId */
  saveItem(item: NewNewsItem): Promise<SaveItemResult>;
  /** newsId of a stored item with this source URL, if any */
  findItemBySourceUrl(url: string): Promise<string | null>;
  /** Embeddings of items created at or after `since` */
  queryRecentEmbeddings(since: Date): Promise<StoredEmbedding[]>;
  /**
   * Items of a feed created at or after `since` that lack a channel
   * publication for at least one of `recipientIds`, oldest first, with the
   * recipients that already received them.
   */
  listPendingItems(feedId: number, since: Date, recipientIds: string[], limit: number): Promise<PendingItem[]>;

  // ============ TRANSLATIONS ============

  /** Upsert on (newsId, language) */
  saveTranslation(translation: NewTranslation): Promise<Translation>;
  getTranslations(newsId: string): Promise<Translation[]>;

  // ============ PUBLICATIONS ============

  /** Idempotent on (newsId, translationId, recipientType, recipientId) */
  recordPublication(record: NewPublicationRecord): Promise<PublicationRecord>;
  /** Distinct items of the feed published to channels at or after `since` */
  countPublications(feedId: number, since: Date): Promise<number>;
  lastPublicationTime(feedId: number): Promise<Date | null>;
}
