/**
 * Stage 2: Translation
 *
 * Sends every stored prompt to the generation service and stores the raw
 * result under the matching translated_ key. Any generation error ends the
 * run; chunks already written stay in the store.
 */

import type { ArtifactLocator, IArtifactStore } from '../interfaces/artifact-store.js';
import type { GenerationService } from '../interfaces/services.js';
import type { SessionKeys } from '../pipeline/artifact-keys.js';
import type { SessionTracker } from '../pipeline/session-tracker.js';
import { parseSequence, translatedKeyForPrompt } from '../pipeline/artifact-keys.js';
import { asGenerationFailure } from '../errors.js';
import { mapInParallel } from '../utils/concurrency.js';

export interface TranslateStageInput {
  keys: SessionKeys;
  temperature: number;
  concurrency: number;
  tracker: SessionTracker;
  resume?: boolean;
  signal?: AbortSignal;
}

export interface TranslatedChunk {
  index: number;
  prompt: ArtifactLocator;
  translated: ArtifactLocator;
  rawText: string;
}

export class TranslateStage {
  private generation: GenerationService;
  private store: IArtifactStore;

  constructor(generation: GenerationService, store: IArtifactStore) {
    this.generation = generation;
    this.store = store;
  }

  async execute(input: TranslateStageInput): Promise<TranslatedChunk[]> {
    const prompts = await this.store.listByPrefix(input.keys.promptsPrefix());
    const total = prompts.length;

    console.log(`[TranslateStage] Translating ${total} chunks (concurrency ${input.concurrency})`);

    return mapInParallel(
      prompts,
      input.concurrency,
      async (prompt, i): Promise<TranslatedChunk> => {
        const index = parseSequence(prompt.key) ?? i + 1;
        const translatedKey = translatedKeyForPrompt(prompt.key);

        if (input.resume && (await this.store.exists(translatedKey))) {
          const rawText = await this.store.getText(translatedKey);
          input.tracker.increment('translationsCompleted');
          console.log(`[TranslateStage] Chunk ${index}/${total} already translated, reusing`);
          return { index, prompt, translated: this.store.locate(translatedKey), rawText };
        }

        const promptText = await this.store.getText(prompt);
        const rawText = await this.generation
          .generate(promptText, input.temperature)
          .catch((error: unknown) => {
            throw asGenerationFailure(error, { promptKey: prompt.key });
          });
        const translated = await this.store.put(translatedKey, rawText);
        input.tracker.increment('translationsCompleted');

        console.log(`[TranslateStage] Chunk ${index}/${total} translated (${rawText.length} chars)`);
        return { index, prompt, translated, rawText };
      },
      input.signal
    );
  }
}
