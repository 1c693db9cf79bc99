/**
 * FeedRelay — Translation Cache
 *
 * Translated text keyed by (fingerprint of source text, source language,
 * target language).
 */

import { TtlCache, type CacheOptions, type CacheStats } from '../lib/cache';
import { fingerprint } from '../feeds/text';

export class TranslationCache {
  private readonly cache: TtlCache<string, string>;

  constructor(options: CacheOptions) {
    this.cache = new TtlCache(options);
  }

  static key(text: string, sourceLang: string, targetLang: string): string {
    return `${fingerprint(text)}:${sourceLang}:${targetLang}`;
  }

  get(text: string, sourceLang: string, targetLang: string): string | undefined {
    return this.cache.get(TranslationCache.key(text, sourceLang, targetLang));
  }

  set(text: string, sourceLang: string, targetLang: string, translated: string): void {
    this.cache.set(TranslationCache.key(text, sourceLang, targetLang), translated);
  }

  get size(): number {
    return this.cache.size;
  }

  sweep(): number {
    return this.cache.sweep();
  }

  startCleanup(): void {
    this.cache.startCleanup();
  }

  stopCleanup(): void {
    this.cache.stopCleanup();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }
}
