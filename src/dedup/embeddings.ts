/**
 * FeedRelay — Embeddings
 *
 * Sentence embeddings for duplicate detection. Vectors are stored next to
 * each item, so every provider must return the configured dimensionality.
 */

import { GoogleGenAI } from '@google/genai';
import { EmbeddingError, toErrorMessage } from '../lib/errors';
import { isTransientError, withRetry, type RetryPolicy } from '../lib/retry';

export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

// ============================================================
// GEMINI
// ============================================================

/**
 * The slice of the Gemini SDK this module uses.
 */
export interface EmbedContentClient {
  models: {
    embedContent(params: {
      model: string;
      contents: string | string[];
      config?: { outputDimensionality?: number; taskType?: string };
    }): Promise<{ embeddings?: Array<{ values?: number[] }> }>;
  };
}

export interface GeminiEmbeddingOptions {
  apiKey?: string;
  model?: string;
  dimensions?: number;
  client?: EmbedContentClient;
  retryPolicy?: RetryPolicy;
}

const EMBEDDING_RETRY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1_000,
  maxDelayMs: 8_000,
  factor: 2,
  jitter: 0.1,
};

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  private readonly model: string;
  private readonly client: EmbedContentClient;
  private readonly retryPolicy: RetryPolicy;

  constructor(options: GeminiEmbeddingOptions) {
    this.model = options.model ?? 'gemini-embedding-001';
    this.dimensions = options.dimensions ?? 384;
    this.retryPolicy = options.retryPolicy ?? EMBEDDING_RETRY;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new GoogleGenAI({ apiKey: options.apiKey });
    } else {
      throw new EmbeddingError('GEMINI_API_KEY is required for embeddings');
    }
  }

  async embed(text: string): Promise<number[]> {
    let response: { embeddings?: Array<{ values?: number[] }> };
    try {
      response = await withRetry(
        () =>
          this.client.models.embedContent({
            model: this.model,
            contents: text,
            config: {
              outputDimensionality: this.dimensions,
              taskType: 'SEMANTIC_SIMILARITY',
            },
          }),
        this.retryPolicy,
        { isRetryable: isTransientError }
      );
    } catch (error) {
      throw new EmbeddingError(`Embedding request failed: ${toErrorMessage(error)}`, error);
    }

    const values = response.embeddings?.[0]?.values;
    if (!values) {
      throw new EmbeddingError('Embedding response missing values');
    }
    if (values.length !== this.dimensions) {
      throw new EmbeddingError(
        `Expected ${this.dimensions} dimensions, got ${values.length}`
      );
    }
    return values;
  }
}
