/**
 * FeedRelay — Supabase Storage Gateway
 *
 * StorageGateway over the Supabase REST API. Rows are validated with zod
 * on the way in. Queries the REST filters cannot express live in SQL
 * functions (see supabase/migrations) and are called through rpc().
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { FeedSource } from '../types/feed';
import { DEFAULT_COOLDOWN_MINUTES, DEFAULT_MAX_NEWS_PER_HOUR } from '../types/feed';
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
import { StorageError } from '../lib/errors';
import { UNIQUE_VIOLATION, handleSupabaseError } from './client';
import type { SaveItemResult, StorageGateway } from './gateway';

// ============================================================
// ROW SCHEMAS
// ============================================================

const VectorSchema = z.array(z.number());

/** pgvector columns come back as '[0.1,0.2,...]' */
const EmbeddingColumn = z
  .union([z.string(), VectorSchema])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) return null;
    if (Array.isArray(value)) return value;
    try {
      return VectorSchema.parse(JSON.parse(value));
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'embedding is not a vector literal' });
      return z.NEVER;
    }
  });

const NamedRelation = z.object({ name: z.string() }).nullish();

const FeedRowSchema = z.object({
  id: z.number(),
  source_id: z.number().nullish(),
  name: z.string().nullish(),
  url: z.string(),
  language: z.string(),
  category_id: z.number().nullish(),
  is_active: z.boolean(),
  cooldown_minutes: z.number().nullish(),
  max_news_per_hour: z.number().nullish(),
  last_fetched_at: z.string().nullish(),
  categories: NamedRelation,
  sources: NamedRelation,
});

const NewsRowSchema = z.object({
  news_id: z.string(),
  original_title: z.string(),
  original_content: z.string(),
  original_language: z.string(),
  category_id: z.number().nullish(),
  rss_feed_id: z.number(),
  source_url: z.string(),
  embedding: EmbeddingColumn,
  image_url: z.string().nullish(),
  video_url: z.string().nullish(),
  image_filename: z.string().nullish(),
  video_filename: z.string().nullish(),
  published_at: z.string().nullish(),
  created_at: z.string(),
});

const PendingRowSchema = NewsRowSchema.extend({
  published_recipients: z.array(z.string()).nullish(),
});

const TranslationRowSchema = z.object({
  id: z.number(),
  news_id: z.string(),
  language: z.string(),
  translated_title: z.string(),
  translated_content: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const PublicationRowSchema = z.object({
  id: z.number(),
  news_id: z.string(),
  translation_id: z.number().nullable(),
  recipient_type: z.enum(['channel', 'user']),
  recipient_id: z.string(),
  message_id: z.string().nullish(),
  language: z.string(),
  sent_at: z.string(),
});

const EmbeddingRowSchema = z.object({
  news_id: z.string(),
  embedding: EmbeddingColumn,
});

// ============================================================
// MAPPERS
// ============================================================

function parseRow<S extends z.ZodTypeAny>(schema: S, operation: string, row: unknown): z.output<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new StorageError(operation, `unexpected row shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

function toFeed(row: z.infer<typeof FeedRowSchema>): FeedSource {
  return {
    id: row.id,
    sourceId: row.source_id ?? null,
    name: row.name ?? row.url,
    url: row.url,
    language: row.language,
    categoryId: row.category_id ?? null,
    categoryName: row.categories?.name ?? null,
    sourceName: row.sources?.name ?? null,
    cooldownMinutes: row.cooldown_minutes ?? DEFAULT_COOLDOWN_MINUTES,
    maxNewsPerHour: row.max_news_per_hour ?? DEFAULT_MAX_NEWS_PER_HOUR,
    isActive: row.is_active,
    lastFetchedAt: row.last_fetched_at ?? null,
  };
}

function toNewsItem(row: z.infer<typeof NewsRowSchema>): NewsItem {
  return {
    newsId: row.news_id,
    originalTitle: row.original_title,
    originalContent: row.original_content,
    originalLanguage: row.original_language,
    categoryId: row.category_id ?? null,
    rssFeedId: row.rss_feed_id,
    sourceUrl: row.source_url,
    embedding: row.embedding,
    imageUrl: row.image_url ?? null,
    videoUrl: row.video_url ?? null,
    imageFilename: row.image_filename ?? null,
    videoFilename: row.video_filename ?? null,
    publishedAt: row.published_at ?? row.created_at,
    createdAt: row.created_at,
  };
}

function toTranslation(row: z.infer<typeof TranslationRowSchema>): Translation {
  return {
    id: row.id,
    newsId: row.news_id,
    language: row.language,
    translatedTitle: row.translated_title,
    translatedContent: row.translated_content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toPublication(row: z.infer<typeof PublicationRowSchema>): PublicationRecord {
  return {
    id: row.id,
    newsId: row.news_id,
    translationId: row.translation_id,
    recipientType: row.recipient_type,
    recipientId: row.recipient_id,
    messageId: row.message_id ?? null,
    language: row.language,
    sentAt: row.sent_at,
  };
}

function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

// ============================================================
// GATEWAY
// ============================================================

const FEED_COLUMNS =
  'id, source_id, name, url, language, category_id, is_active, cooldown_minutes, max_news_per_hour, last_fetched_at, categories(name), sources(name)';

export class SupabaseStorageGateway implements StorageGateway {
  constructor(private readonly client: SupabaseClient) {}

  // ============ FEEDS ============

  async listActiveFeeds(): Promise<FeedSource[]> {
    const { data, error } = await this.client
      .from('rss_feeds')
      .select(FEED_COLUMNS)
      .eq('is_active', true)
      .order('id', { ascending: true });

    if (error) throw handleSupabaseError('listActiveFeeds', error);
    return (data ?? []).map((row: unknown) => toFeed(parseRow(FeedRowSchema, 'listActiveFeeds', row)));
  }

  async markFeedFetched(feedId: number, at: Date): Promise<void> {
    const { error } = await this.client
      .from('rss_feeds')
      .update({ last_fetched_at: at.toISOString() })
      .eq('id', feedId);

    if (error) throw handleSupabaseError('markFeedFetched', error);
  }

  // ============ ITEMS ============

  async saveItem(item: NewNewsItem): Promise<SaveItemResult> {
    const { data, error } = await this.client
      .from('published_news_data')
      .insert({
        news_id: item.newsId,
        original_title: item.originalTitle,
        original_content: item.originalContent,
        original_language: item.originalLanguage,
        category_id: item.categoryId,
        rss_feed_id: item.rssFeedId,
        source_url: item.sourceUrl,
        embedding: item.embedding ? toVectorLiteral(item.embedding) : null,
        image_url: item.imageUrl,
        video_url: item.videoUrl,
        published_at: item.publishedAt,
      })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        const existing = await this.getItem(item.newsId);
        if (existing) return { item: existing, created: false };
      }
      throw handleSupabaseError('saveItem', error);
    }

    return { item: toNewsItem(parseRow(NewsRowSchema, 'saveItem', data)), created: true };
  }

  async findItemBySourceUrl(url: string): Promise<string | null> {
    const { data, error } = await this.client
      .from('published_news_data')
      .select('news_id')
      .eq('source_url', url)
      .limit(1)
      .maybeSingle();

    if (error) throw handleSupabaseError('findItemBySourceUrl', error);
    if (!data) return null;
    return parseRow(z.object({ news_id: z.string() }), 'findItemBySourceUrl', data).news_id;
  }

  async queryRecentEmbeddings(since: Date): Promise<StoredEmbedding[]> {
    const { data, error } = await this.client
      .from('published_news_data')
      .select('news_id, embedding')
      .gte('created_at', since.toISOString())
      .not('embedding', 'is', null);

    if (error) throw handleSupabaseError('queryRecentEmbeddings', error);

    const result: StoredEmbedding[] = [];
    for (const row of data ?? []) {
      const parsed = parseRow(EmbeddingRowSchema, 'queryRecentEmbeddings', row);
      if (parsed.embedding) {
        result.push({ newsId: parsed.news_id, embedding: parsed.embedding });
      }
    }
    return result;
  }

  async listPendingItems(
    feedId: number,
    since: Date,
    recipientIds: string[],
    limit: number
  ): Promise<PendingItem[]> {
    if (recipientIds.length === 0) return [];

    const { data, error } = await this.client.rpc('pending_feed_items', {
      p_feed_id: feedId,
      p_since: since.toISOString(),
      p_recipients: recipientIds,
      p_limit: limit,
    });

    if (error) throw handleSupabaseError('listPendingItems', error);

    const rows: unknown[] = Array.isArray(data) ? data : [];
    return rows.map((row) => {
      const parsed = parseRow(PendingRowSchema, 'listPendingItems', row);
      return {
        item: toNewsItem(parsed),
        publishedRecipients: parsed.published_recipients ?? [],
      };
    });
  }

  private async getItem(newsId: string): Promise<NewsItem | null> {
    const { data, error } = await this.client
      .from('published_news_data')
      .select('*')
      .eq('news_id', newsId)
      .maybeSingle();

    if (error) throw handleSupabaseError('getItem', error);
    return data ? toNewsItem(parseRow(NewsRowSchema, 'getItem', data)) : null;
  }

  // ============ TRANSLATIONS ============

  async saveTranslation(translation: NewTranslation): Promise<Translation> {
    const { data, error } = await this.client
      .from('news_translations')
      .upsert(
        {
          news_id: translation.newsId,
          language: translation.language,
          translated_title: translation.translatedTitle,
          translated_content: translation.translatedContent,
          updated_at: new Date().toISOString(),
        },
        { onConflict: 'news_id,language' }
      )
      .select()
      .single();

    if (error) throw handleSupabaseError('saveTranslation', error);
    return toTranslation(parseRow(TranslationRowSchema, 'saveTranslation', data));
  }

  async getTranslations(newsId: string): Promise<Translation[]> {
    const { data, error } = await this.client
      .from('news_translations')
      .select('*')
      .eq('news_id', newsId);

    if (error) throw handleSupabaseError('getTranslations', error);
    return (data ?? []).map((row: unknown) =>
      toTranslation(parseRow(TranslationRowSchema, 'getTranslations', row))
    );
  }

  // ============ PUBLICATIONS ============

  async recordPublication(record: NewPublicationRecord): Promise<PublicationRecord> {
    const { data, error } = await this.client
      .from('rss_items_telegram_bot_published')
      .insert({
        news_id: record.newsId,
        translation_id: record.translationId,
        recipient_type: record.recipientType,
        recipient_id: record.recipientId,
        message_id: record.messageId,
        language: record.language,
        sent_at: record.sentAt,
      })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        const existing = await this.findPublication(record);
        if (existing) return existing;
      }
      throw handleSupabaseError('recordPublication', error);
    }

    return toPublication(parseRow(PublicationRowSchema, 'recordPublication', data));
  }

  async countPublications(feedId: number, since: Date): Promise<number> {
    const { data, error } = await this.client.rpc('count_feed_publications', {
      p_feed_id: feedId,
      p_since: since.toISOString(),
    });

    if (error) throw handleSupabaseError('countPublications', error);
    return parseRow(z.coerce.number().int().min(0), 'countPublications', data);
  }

  async lastPublicationTime(feedId: number): Promise<Date | null> {
    const { data, error } = await this.client.rpc('last_feed_publication', {
      p_feed_id: feedId,
    });

    if (error) throw handleSupabaseError('lastPublicationTime', error);
    const value = parseRow(z.string().nullable(), 'lastPublicationTime', data);
    return value ? new Date(value) : null;
  }

  private async findPublication(record: NewPublicationRecord): Promise<PublicationRecord | null> {
    let query = this.client
      .from('rss_items_telegram_bot_published')
      .select('*')
      .eq('news_id', record.newsId)
      .eq('recipient_type', record.recipientType)
      .eq('recipient_id', record.recipientId);

    query = record.translationId === null
      ? query.is('translation_id', null)
      : query.eq('translation_id', record.translationId);

    const { data, error } = await query.limit(1).maybeSingle();
    if (error) throw handleSupabaseError('findPublication', error);
    return data ? toPublication(parseRow(PublicationRowSchema, 'findPublication', data)) : null;
  }
}
