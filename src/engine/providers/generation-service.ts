/**
 * Generation service backed by an LLM provider
 */

import type { CompletionResult, ILLMProvider } from '../interfaces/llm-provider.js';
import type { GenerationService } from '../interfaces/services.js';
import { GenerationFailure, errorMessage } from '../errors.js';

export interface ProviderGenerationOptions {
  maxOutputTokens?: number;
}

export class ProviderGenerationService implements GenerationService {
  private provider: ILLMProvider;
  private maxOutputTokens: number;

  constructor(provider: ILLMProvider, options: ProviderGenerationOptions = {}) {
    this.provider = provider;
    this.maxOutputTokens = options.maxOutputTokens ?? 8192;
  }

  async generate(prompt: string, temperature: number): Promise<string> {
    let result: CompletionResult;
    try {
      result = await this.provider.complete([{ role: 'user', content: prompt }], {
        temperature,
        maxTokens: this.maxOutputTokens,
        topP: 1.0,
      });
    } catch (error) {
      throw new GenerationFailure(
        `${this.provider.name} generation failed: ${errorMessage(error)}`,
        { model: this.provider.model },
        error
      );
    }

    if (result.finishReason === 'length') {
      console.warn(
        `[Generation] ⚠️ Output hit the token limit (${this.maxOutputTokens}), response may be truncated`
      );
    }
    if (result.content.trim().length === 0) {
      console.warn(`[Generation] ⚠️ ${this.provider.model} returned an empty response`);
    }

    return result.content;
  }
}
