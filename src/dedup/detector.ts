/**
 * FeedRelay — Duplicate Detector
 *
 * Decides whether a candidate entry repeats a story stored within the
 * lookback window:
 * 1. Same source URL as a stored item → duplicate
 * 2. Embed title + opening of the content
 * 3. Nearest stored item at or above the threshold → duplicate
 *
 * Any failure classifies the candidate as unique (fail-open) and is
 * reported.
 */

import type { StorageGateway } from '../db/gateway';
import { EmbeddingError, toErrorMessage } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';
import { cleanHtml, truncate } from '../feeds/text';
import type { EmbeddingProvider } from './embeddings';
import { RecentItemIndex, thresholdFor } from './similarity';

// ============================================================
// TYPES
// ============================================================

export interface DuplicateCandidate {
  title: string;
  content: string;
  link: string;
}

export type DuplicateReason = 'same_url' | 'similar' | 'unique' | 'classifier_error' | 'disabled';

export interface DuplicateVerdict {
  duplicate: boolean;
  reason: DuplicateReason;
  matchedId?: string;
  similarity?: number;
  threshold?: number;
  /** Candidate embedding, reused when the item is stored */
  embedding?: number[];
  error?: string;
}

export interface DetectorConfig {
  enabled?: boolean;
  /** Base threshold; similarity at or above it is a duplicate */
  similarityThreshold?: number;
  adaptiveThreshold?: boolean;
  lookbackHours?: number;
  /** Characters of content included in the embedded text */
  contentPrefixLength?: number;
  /** Neighbours inspected per candidate */
  topK?: number;
}

export interface DetectorDeps {
  storage: StorageGateway;
  /** Required unless the detector is disabled */
  embeddings?: EmbeddingProvider;
  index?: RecentItemIndex;
  logger?: Logger;
}

const DEFAULT_CONFIG: Required<DetectorConfig> = {
  enabled: true,
  similarityThreshold: 0.95,
  adaptiveThreshold: true,
  lookbackHours: 24,
  contentPrefixLength: 500,
  topK: 5,
};

/**
 * The text that gets embedded for a candidate.
 */
export function candidateText(candidate: DuplicateCandidate, contentPrefixLength = 500): string {
  const title = cleanHtml(candidate.title);
  const content = truncate(cleanHtml(candidate.content), contentPrefixLength);
  return content ? `${title} ${content}` : title;
}

// ============================================================
// DETECTOR
// ============================================================

export class DuplicateDetector {
  private readonly config: Required<DetectorConfig>;
  private readonly storage: StorageGateway;
  private readonly embeddings: EmbeddingProvider | null;
  private readonly index: RecentItemIndex;
  private readonly log: Logger;
  private failures = 0;

  constructor(config: DetectorConfig, deps: DetectorDeps) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.storage = deps.storage;
    this.embeddings = deps.embeddings ?? null;
    this.index = deps.index ?? new RecentItemIndex();
    this.log = (deps.logger ?? rootLogger).child({ component: 'dedup' });
  }

  get indexSize(): number {
    return this.index.size;
  }

  /** Classifier failures since startup */
  get failureCount(): number {
    return this.failures;
  }

  /**
   * Reload the index from storage. Called at the start of every pass.
   * On failure the previous index is kept.
   */
  async refresh(now: Date = new Date()): Promise<void> {
    if (!this.config.enabled) return;

    const since = new Date(now.getTime() - this.config.lookbackHours * 3_600_000);
    try {
      const recent = await this.storage.queryRecentEmbeddings(since);
      this.index.load(recent);
      this.log.debug('Dedup index refreshed', { items: recent.length, since: since.toISOString() });
    } catch (error) {
      this.failures++;
      this.log.error('Dedup index refresh failed, keeping previous index', {
        error: toErrorMessage(error),
        items: this.index.size,
      });
    }
  }

  /**
   * Classify a candidate. Does not modify the index.
   */
  async isDuplicate(candidate: DuplicateCandidate): Promise<DuplicateVerdict> {
    if (!this.config.enabled) {
      return { duplicate: false, reason: 'disabled' };
    }

    try {
      const existingId = await this.storage.findItemBySourceUrl(candidate.link);
      if (existingId) {
        return { duplicate: true, reason: 'same_url', matchedId: existingId, similarity: 1 };
      }

      if (!this.embeddings) {
        throw new EmbeddingError('No embedding provider configured');
      }
      const text = candidateText(candidate, this.config.contentPrefixLength);
      const embedding = await this.embeddings.embed(text);
      const threshold = thresholdFor(text.length, {
        base: this.config.similarityThreshold,
        adaptive: this.config.adaptiveThreshold,
      });

      const [best] = this.index.nearest(embedding, this.config.topK);
      if (best && best.similarity >= threshold) {
        this.log.debug('Duplicate found', {
          matchedId: best.newsId,
          similarity: Number(best.similarity.toFixed(4)),
          threshold,
        });
        return {
          duplicate: true,
          reason: 'similar',
          matchedId: best.newsId,
          similarity: best.similarity,
          threshold,
          embedding,
        };
      }

      return {
        duplicate: false,
        reason: 'unique',
        similarity: best?.similarity,
        threshold,
        embedding,
      };
    } catch (error) {
      this.failures++;
      const errorMessage = toErrorMessage(error);
      this.log.error('Duplicate check failed, treating item as new', {
        link: candidate.link,
        error: errorMessage,
      });
      return { duplicate: false, reason: 'classifier_error', error: errorMessage };
    }
  }

  /**
   * Add a stored item so later candidates in the same pass see it.
   */
  remember(newsId: string, embedding: number[] | null | undefined): void {
    if (embedding && embedding.length > 0) {
      this.index.add(newsId, embedding);
    }
  }
}
