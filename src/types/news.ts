/**
 * FeedRelay — News Types
 *
 * Stored items, their translations and publication records.
 */

// ============================================================
// NEWS ITEM
// ============================================================

/**
 * A stored, deduplicated story. Immutable once saved.
 */
export interface NewsItem {
  /** sha256 hex over title, content, link and feed id */
  newsId: string;
  originalTitle: string;
  originalContent: string;
  originalLanguage: string;
  categoryId: number | null;
  rssFeedId: number;
  sourceUrl: string;
  embedding: number[] | null;
  imageUrl: string | null;
  videoUrl: string | null;
  imageFilename: string | null;
  videoFilename: string | null;
  publishedAt: string;
  createdAt: string;
}

export type NewNewsItem = Omit<NewsItem, 'createdAt' | 'imageFilename' | 'videoFilename'>;

// ============================================================
// TRANSLATION
// ============================================================

export interface Translation {
  id: number;
  newsId: string;
  language: string;
  translatedTitle: string;
  translatedContent: string;
  createdAt: string;
  updatedAt: string;
}

export type NewTranslation = Pick<
  Translation,
  'newsId' | 'language' | 'translatedTitle' | 'translatedContent'
>;

// ============================================================
// PUBLICATION
// ============================================================

export type RecipientType = 'channel' | 'user';

export interface Recipient {
  type: RecipientType;
  id: string;
  language: string;
}

/**
 * Append-only. Unique on (newsId, translationId, recipientType, recipientId).
 */
export interface PublicationRecord {
  id: number;
  newsId: string;
  translationId: number | null;
  recipientType: RecipientType;
  recipientId: string;
  messageId: string | null;
  language: string;
  sentAt: string;
}

export type NewPublicationRecord = Omit<PublicationRecord, 'id'>;

/**
 * A stored item that still has recipients without a publication record.
 */
export interface PendingItem {
  item: NewsItem;
  /** Recipient ids that already have a record for this item */
  publishedRecipients: string[];
}

export interface StoredEmbedding {
  newsId: string;
  embedding: number[];
}
