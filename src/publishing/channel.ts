/**
 * FeedRelay — Publication channel contract
 */

import type { NewsItem, Recipient, Translation } from '../types/news';

export interface PublishContext {
  categoryName?: string | null;
  sourceName?: string | null;
}

export interface PublishResult {
  recipient: Recipient;
  ok: boolean;
  messageId?: string;
  error?: string;
}

/**
 * Delivers an item to recipients. `translation` null means the original
 * text is sent. One result per recipient; failures are reported, not thrown.
 */
export interface PublicationChannel {
  publish(
    item: NewsItem,
    translation: Translation | null,
    recipients: Recipient[],
    context?: PublishContext
  ): Promise<PublishResult[]>;
}
