/**
 * Deterministic EmbeddingProvider backed by a function of the text.
 */

import type { EmbeddingProvider } from '../../src/dedup/embeddings';

export class FakeEmbeddings implements EmbeddingProvider {
  readonly texts: string[] = [];
  error: Error | null = null;

  constructor(
    private readonly vectorFor: (text: string) => number[],
    readonly dimensions = 3
  ) {}

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    if (this.error) throw this.error;
    return this.vectorFor(text);
  }
}

/** Vector with `1` at `index`, zero elsewhere */
export function unitVector(index: number, dimensions = 3): number[] {
  return Array.from({ length: dimensions }, (_, i) => (i === index ? 1 : 0));
}
