/**
 * Validation service backed by an LLM provider
 *
 * Reads the prompt and translated artifacts from the store, asks the model
 * to review the translation and returns the corrected text.
 */

import type { IArtifactStore, ArtifactLocator } from '../interfaces/artifact-store.js';
import type { ILLMProvider, Message } from '../interfaces/llm-provider.js';
import type { ValidationService } from '../interfaces/services.js';
import { VALIDATOR_SYSTEM_PROMPT, createValidatorPrompt } from '../prompts/system/editor.js';
import { ValidationFailure, errorMessage } from '../errors.js';

export interface ProviderValidationOptions {
  temperature?: number;
  maxOutputTokens?: number;
}

export class ProviderValidationService implements ValidationService {
  private provider: ILLMProvider;
  private store: IArtifactStore;
  private temperature: number;
  private maxOutputTokens: number;

  constructor(provider: ILLMProvider, store: IArtifactStore, options: ProviderValidationOptions = {}) {
    this.provider = provider;
    this.store = store;
    this.temperature = options.temperature ?? 0.3;
    this.maxOutputTokens = options.maxOutputTokens ?? 8192;
  }

  async validate(promptLocator: ArtifactLocator, translatedLocator: ArtifactLocator): Promise<string> {
    console.log(`[Validation] Validating ${translatedLocator.key}`);

    try {
      const [originalPrompt, translatedText] = await Promise.all([
        this.store.getText(promptLocator),
        this.store.getText(translatedLocator),
      ]);

      const messages: Message[] = [
        { role: 'system', content: VALIDATOR_SYSTEM_PROMPT },
        { role: 'user', content: createValidatorPrompt(originalPrompt, translatedText) },
      ];

      const response = await this.provider.complete(messages, {
        temperature: this.temperature,
        maxTokens: this.maxOutputTokens,
      });

      if (response.finishReason === 'length') {
        throw new Error('validator output was cut at the token limit');
      }

      return response.content;
    } catch (error) {
      throw new ValidationFailure(
        `Validation failed for ${translatedLocator.key}: ${errorMessage(error)}`,
        { promptKey: promptLocator.key, translatedKey: translatedLocator.key },
        error
      );
    }
  }
}
