/**
 * FeedRelay — Telegram Channel
 *
 * Posts items to Telegram chats through the Bot API.
 * Items with an image go out as a photo with a caption; the rest as text.
 */

import { z } from 'zod';
import type { NewsItem, Recipient, Translation } from '../types/news';
import { PublishError, toErrorMessage } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';
import type { PublicationChannel, PublishContext, PublishResult } from './channel';
import { CAPTION_LIMIT, MESSAGE_LIMIT, formatMessage, toHashtag } from './format';

// ============================================================
// TYPES
// ============================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TelegramConfig {
  botToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
}

export interface TelegramDeps {
  fetchImpl?: FetchLike;
  logger?: Logger;
}

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).passthrough().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

type TelegramMethod = 'sendMessage' | 'sendPhoto';

// ============================================================
// CHANNEL
// ============================================================

export class TelegramChannel implements PublicationChannel {
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(private readonly config: TelegramConfig, deps: TelegramDeps = {}) {
    if (!config.botToken) {
      throw new PublishError('telegram', 'TELEGRAM_BOT_TOKEN not configured');
    }
    this.apiBaseUrl = (config.apiBaseUrl ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.fetchImpl = deps.fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = (deps.logger ?? rootLogger).child({ component: 'telegram' });
  }

  async publish(
    item: NewsItem,
    translation: Translation | null,
    recipients: Recipient[],
    context: PublishContext = {}
  ): Promise<PublishResult[]> {
    const results: PublishResult[] = [];

    for (const recipient of recipients) {
      try {
        const messageId = await this.sendTo(item, translation, recipient, context);
        results.push({ recipient, ok: true, messageId });
      } catch (error) {
        const errorMessage = toErrorMessage(error);
        this.log.warn('Telegram publish failed', {
          newsId: item.newsId,
          chatId: recipient.id,
          error: errorMessage,
        });
        results.push({ recipient, ok: false, error: errorMessage });
      }
    }

    return results;
  }

  private async sendTo(
    item: NewsItem,
    translation: Translation | null,
    recipient: Recipient,
    context: PublishContext
  ): Promise<string> {
    const hashtags = [toHashtag(context.categoryName), toHashtag(context.sourceName)].filter(
      (tag): tag is string => tag !== null
    );
    const parts = {
      title: translation?.translatedTitle ?? item.originalTitle,
      content: translation?.translatedContent ?? item.originalContent,
      sourceUrl: item.sourceUrl,
      language: recipient.language,
      hashtags,
    };

    if (item.imageUrl) {
      try {
        return await this.call('sendPhoto', {
          chat_id: recipient.id,
          photo: item.imageUrl,
          caption: formatMessage(parts, CAPTION_LIMIT),
          parse_mode: 'HTML',
        });
      } catch (error) {
        // Telegram rejects some remote images; the text still goes out
        this.log.debug('Photo rejected, sending text', {
          newsId: item.newsId,
          error: toErrorMessage(error),
        });
      }
    }

    return this.call('sendMessage', {
      chat_id: recipient.id,
      text: formatMessage(parts, MESSAGE_LIMIT),
      parse_mode: 'HTML',
      disable_web_page_preview: false,
    });
  }

  private async call(method: TelegramMethod, body: Record<string, unknown>): Promise<string> {
    const chatId = String(body.chat_id);
    const res = await this.fetchImpl(`${this.apiBaseUrl}/bot${this.config.botToken}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const parsed = TelegramResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new PublishError(chatId, `Unexpected Telegram response (HTTP ${res.status})`);
    }

    const data = parsed.data;
    if (!data.ok || !data.result) {
      throw new PublishError(chatId, `Telegram API error: ${data.description ?? `HTTP ${res.status}`}`);
    }

    return String(data.result.message_id);
  }
}
