/**
 * Stage 3: Validation
 *
 * Asks the validation service to review each translated chunk against its
 * prompt. The reviewed text becomes the final chunk; when the review fails
 * or comes back empty the raw translation is used instead and the chunk is
 * recorded as a fallback. With validation disabled the raw translation is
 * copied to the final key.
 */

import type { IArtifactStore } from '../interfaces/artifact-store.js';
import type { ValidationService } from '../interfaces/services.js';
import type { TranslationResult } from '../types/pipeline.js';
import type { SessionTracker } from '../pipeline/session-tracker.js';
import type { TranslatedChunk } from './stage-2-translate.js';
import { finalKeyForPrompt } from '../pipeline/artifact-keys.js';
import { ValidationFailure, errorMessage } from '../errors.js';
import { mapInParallel, throwIfCancelled } from '../utils/concurrency.js';

export interface ValidateStageInput {
  chunks: TranslatedChunk[];
  enabled: boolean;
  concurrency: number;
  tracker: SessionTracker;
  resume?: boolean;
  previousFallbacks?: readonly number[];
  signal?: AbortSignal;
}

export class ValidateStage {
  private validation: ValidationService | null;
  private store: IArtifactStore;

  constructor(validation: ValidationService | null, store: IArtifactStore) {
    this.validation = validation;
    this.store = store;
  }

  async execute(input: ValidateStageInput): Promise<TranslationResult[]> {
    const validator = input.enabled ? this.validation : null;
    if (validator) {
      console.log(`[ValidateStage] Validating ${input.chunks.length} chunks`);
    }

    return mapInParallel(
      input.chunks,
      input.concurrency,
      async (chunk): Promise<TranslationResult> => {
        const finalKey = finalKeyForPrompt(chunk.prompt.key);

        if (input.resume && (await this.store.exists(finalKey))) {
          const finalText = await this.store.getText(finalKey);
          if (!validator) {
            return { index: chunk.index, rawText: chunk.rawText, finalText, validation: 'skipped' };
          }
          if (input.previousFallbacks?.includes(chunk.index)) {
            input.tracker.increment('validationsFailed');
            input.tracker.recordFallback(chunk.index);
            return { index: chunk.index, rawText: chunk.rawText, finalText, validation: 'fallback' };
          }
          input.tracker.increment('validationsCompleted');
          return {
            index: chunk.index,
            rawText: chunk.rawText,
            validatedText: finalText,
            finalText,
            validation: 'passed',
          };
        }

        if (!validator) {
          await this.store.put(finalKey, chunk.rawText);
          return { index: chunk.index, rawText: chunk.rawText, finalText: chunk.rawText, validation: 'skipped' };
        }

        let validatedText: string | null = null;
        try {
          const reviewed = await validator.validate(chunk.prompt, chunk.translated);
          if (reviewed.trim().length === 0) {
            throw new ValidationFailure(`Validation returned no text for ${chunk.translated.key}`, {
              translatedKey: chunk.translated.key,
            });
          }
          validatedText = reviewed;
        } catch (error) {
          throwIfCancelled(input.signal);
          console.warn(
            `[ValidateStage] Validation failed for chunk ${chunk.index}, using raw translation: ${errorMessage(error)}`
          );
        }

        if (validatedText === null) {
          await this.store.put(finalKey, chunk.rawText);
          input.tracker.increment('validationsFailed');
          input.tracker.recordFallback(chunk.index);
          return { index: chunk.index, rawText: chunk.rawText, finalText: chunk.rawText, validation: 'fallback' };
        }

        await this.store.put(finalKey, validatedText);
        input.tracker.increment('validationsCompleted');
        return {
          index: chunk.index,
          rawText: chunk.rawText,
          validatedText,
          finalText: validatedText,
          validation: 'passed',
        };
      },
      input.signal
    );
  }
}
