/**
 * FeedRelay — Queue executor
 *
 * Runs one queued batch against the model that serves its language pair.
 */

import { CancelledError } from '../lib/errors';
import type { ModelLoader, TranslationModel } from './model';
import type { ModelManager } from './model-manager';
import type { BatchExecutor } from './task-queue';

export function createModelExecutor<M extends TranslationModel>(
  models: ModelManager<M>,
  loader: ModelLoader<M>
): BatchExecutor {
  return async (payloads, signal) => {
    const first = payloads[0];
    if (!first) return [];

    const pair = { source: first.sourceLang, target: first.targetLang };
    const modelName = loader.modelNameFor(pair);

    return models.withModel(modelName, async (model) => {
      if (model.supportsBatch) {
        return model.translate(payloads.map((p) => p.text), pair, signal);
      }

      const results: string[] = [];
      for (const payload of payloads) {
        if (signal.aborted) throw new CancelledError('Translation batch aborted');
        const [translated] = await model.translate([payload.text], pair, signal);
        results.push(translated ?? '');
      }
      return results;
    });
  };
}
