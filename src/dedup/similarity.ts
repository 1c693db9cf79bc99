/**
 * FeedRelay — Similarity
 *
 * Cosine similarity, the length-adjusted duplicate threshold and the
 * in-memory index of recently stored items.
 */

import type { StoredEmbedding } from '../types/news';

// ============================================================
// VECTOR MATH
// ============================================================

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// ============================================================
// THRESHOLD
// ============================================================

export interface ThresholdOptions {
  base: number;
  adaptive: boolean;
}

export const SHORT_TEXT_LENGTH = 50;
export const LONG_TEXT_LENGTH = 1000;
export const MIN_THRESHOLD = 0.7;
export const MAX_THRESHOLD = 0.98;

/**
 * Short texts embed noisily and get a looser threshold; long texts share
 * boilerplate and get a stricter one.
 */
export function thresholdFor(textLength: number, options: ThresholdOptions): number {
  if (!options.adaptive) return options.base;

  let threshold = options.base;
  if (textLength < SHORT_TEXT_LENGTH) threshold -= 0.05;
  else if (textLength > LONG_TEXT_LENGTH) threshold += 0.02;

  return Math.min(MAX_THRESHOLD, Math.max(MIN_THRESHOLD, threshold));
}

// ============================================================
// RECENT ITEM INDEX
// ============================================================

export interface SimilarityMatch {
  newsId: string;
  similarity: number;
}

/**
 * Exact nearest-neighbour search over the items stored within the
 * lookback window.
 */
export class RecentItemIndex {
  private readonly vectors = new Map<string, number[]>();

  get size(): number {
    return this.vectors.size;
  }

  /** Replace the whole index */
  load(items: StoredEmbedding[]): void {
    this.vectors.clear();
    for (const item of items) {
      this.vectors.set(item.newsId, item.embedding);
    }
  }

  add(newsId: string, embedding: number[]): void {
    this.vectors.set(newsId, embedding);
  }

  has(newsId: string): boolean {
    return this.vectors.has(newsId);
  }

  clear(): void {
    this.vectors.clear();
  }

  /**
   * Closest items first. Ties keep insertion order.
   */
  nearest(embedding: number[], limit = 5): SimilarityMatch[] {
    const matches: SimilarityMatch[] = [];
    for (const [newsId, vector] of this.vectors) {
      matches.push({ newsId, similarity: cosineSimilarity(embedding, vector) });
    }
    return matches.sort((a, b) => b.similarity - a.similarity).slice(0, limit);
  }
}
