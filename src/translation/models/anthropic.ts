/**
 * FeedRelay — Claude translation models
 *
 * Production ModelLoader. Each language direction gets its own model
 * handle; a handle translates a whole batch in one request by exchanging
 * a JSON array of strings.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { LanguagePair } from '../../types/translation';
import { CancelledError, TranslationModelError } from '../../lib/errors';
import type { ModelLoader, TranslationModel } from '../model';
import { pairKey } from '../model';

// ============================================================
// COMPLETION CLIENT
// ============================================================

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * The one call a translation model makes: prompt in, text out.
 */
export interface CompletionClient {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

export function createAnthropicCompletionClient(apiKey: string, model: string): CompletionClient {
  const client = new Anthropic({ apiKey });

  return {
    async complete(request, signal) {
      const response = await client.messages.create(
        {
          model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal }
      );

      const textContent = response.content.find((c) => c.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        throw new Error('No text content in response');
      }
      return textContent.text;
    },
  };
}

// ============================================================
// PROMPT
// ============================================================

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  ru: 'Russian',
  de: 'German',
  fr: 'French',
  es: 'Spanish',
  it: 'Italian',
  pt: 'Portuguese',
  uk: 'Ukrainian',
  pl: 'Polish',
  nl: 'Dutch',
  tr: 'Turkish',
  zh: 'Chinese',
  ja: 'Japanese',
  ko: 'Korean',
  ar: 'Arabic',
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

const SYSTEM_PROMPT = `You are a news translator. You receive a JSON array of strings and return a JSON array with the same number of strings, each translated in order.
Keep names, numbers, URLs and hashtags unchanged. Do not add commentary. Respond with the JSON array only.`;

export function buildTranslationPrompt(texts: string[], pair: LanguagePair): string {
  return `Translate from ${languageName(pair.source)} to ${languageName(pair.target)}:\n${JSON.stringify(texts)}`;
}

const TranslationsSchema = z.array(z.string());

/**
 * Read the model's JSON array, tolerating a fenced code block around it.
 */
export function parseTranslations(raw: string, expected: number): string[] {
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start === -1 || end < start) {
    throw new Error('Response contains no JSON array');
  }

  const parsed = TranslationsSchema.safeParse(JSON.parse(raw.slice(start, end + 1)));
  if (!parsed.success) {
    throw new Error('Response is not an array of strings');
  }
  if (parsed.data.length !== expected) {
    throw new Error(`Expected ${expected} translations, got ${parsed.data.length}`);
  }
  return parsed.data;
}

// ============================================================
// MODEL
// ============================================================

export interface ClaudeModelOptions {
  /** Output tokens allowed per source character */
  tokensPerChar?: number;
  maxTokens?: number;
  temperature?: number;
}

export class ClaudeTranslationModel implements TranslationModel {
  readonly supportsBatch = true;
  private client: CompletionClient | null;
  private readonly options: Required<ClaudeModelOptions>;

  constructor(
    readonly name: string,
    readonly pair: LanguagePair,
    client: CompletionClient,
    options: ClaudeModelOptions = {}
  ) {
    this.client = client;
    this.options = {
      tokensPerChar: options.tokensPerChar ?? 1,
      maxTokens: options.maxTokens ?? 8192,
      temperature: options.temperature ?? 0,
    };
  }

  get disposed(): boolean {
    return this.client === null;
  }

  async translate(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]> {
    if (!this.client) {
      throw new TranslationModelError(this.name, 'model has been disposed');
    }
    if (pair.source !== this.pair.source || pair.target !== this.pair.target) {
      throw new TranslationModelError(this.name, `cannot translate ${pairKey(pair)}`);
    }
    if (texts.length === 0) return [];
    if (signal?.aborted) throw new CancelledError('Translation aborted');

    const chars = texts.reduce((sum, text) => sum + text.length, 0);
    const maxTokens = Math.min(this.options.maxTokens, Math.max(256, Math.ceil(chars * this.options.tokensPerChar) + 64));

    const raw = await this.client.complete(
      {
        system: SYSTEM_PROMPT,
        prompt: buildTranslationPrompt(texts, pair),
        maxTokens,
        temperature: this.options.temperature,
      },
      signal
    );

    try {
      return parseTranslations(raw, texts.length);
    } catch (error) {
      throw new TranslationModelError(
        this.name,
        `unusable response: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  async dispose(): Promise<void> {
    this.client = null;
  }
}

// ============================================================
// LOADER
// ============================================================

export interface ClaudeLoaderOptions extends ClaudeModelOptions {
  /** Overrides client creation, used by tests */
  clientFactory?: () => CompletionClient;
  apiKey?: string;
  model?: string;
}

const PAIR_PATTERN = /^([a-z]{2,3})-([a-z]{2,3})$/;

export class ClaudeModelLoader implements ModelLoader<ClaudeTranslationModel> {
  private readonly factory: () => CompletionClient;

  constructor(private readonly options: ClaudeLoaderOptions) {
    const { apiKey, clientFactory } = options;
    if (clientFactory) {
      this.factory = clientFactory;
    } else if (apiKey) {
      const model = options.model ?? 'claude-3-5-haiku-latest';
      this.factory = () => createAnthropicCompletionClient(apiKey, model);
    } else {
      throw new TranslationModelError('claude', 'ANTHROPIC_API_KEY is required for translation');
    }
  }

  modelNameFor(pair: LanguagePair): string {
    return pairKey(pair);
  }

  async load(name: string, signal?: AbortSignal): Promise<ClaudeTranslationModel> {
    if (signal?.aborted) throw new CancelledError('Model load aborted');

    const match = PAIR_PATTERN.exec(name);
    const source = match?.[1];
    const target = match?.[2];
    if (!source || !target) {
      throw new TranslationModelError(name, 'model name must look like "en-ru"');
    }
    if (source === target) {
      throw new TranslationModelError(name, 'source and target languages are the same');
    }

    return new ClaudeTranslationModel(name, { source, target }, this.factory(), this.options);
  }
}
