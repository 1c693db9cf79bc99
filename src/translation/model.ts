/**
 * FeedRelay — Translation model contracts
 */

import type { LanguagePair } from '../types/translation';

/**
 * A loaded translation model. Holds whatever resources loading acquired
 * until `dispose` resolves.
 */
export interface TranslationModel {
  readonly name: string;
  /** true when `translate` handles several texts in one call */
  readonly supportsBatch: boolean;
  translate(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]>;
  dispose(): Promise<void>;
}

export interface ModelLoader<M extends TranslationModel = TranslationModel> {
  /** Name of the model that serves a language pair */
  modelNameFor(pair: LanguagePair): string;
  load(name: string, signal?: AbortSignal): Promise<M>;
}

export function pairKey(pair: LanguagePair): string {
  return `${pair.source}-${pair.target}`;
}
