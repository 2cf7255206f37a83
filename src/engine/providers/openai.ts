/**
 * OpenAI LLM Provider implementation
 */

import OpenAI from 'openai';
import type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
} from '../interfaces/llm-provider.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export class OpenAIProvider implements ILLMProvider {
  readonly name = 'openai';
  readonly model: string;

  private client: OpenAI;

  constructor(config: LLMProviderConfig) {
    this.model = config.model ?? DEFAULT_OPENAI_MODEL;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
    });
  }

  async complete(
    messages: Message[],
    options?: CompletionOptions
  ): Promise<CompletionResult> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(m => ({
        role: m.role,
        content: m.content,
      })),
      temperature: options?.temperature ?? 1.0,
      max_tokens: options?.maxTokens ?? 8192,
      top_p: options?.topP,
    });

    const choice = response.choices[0];

    return {
      content: choice?.message.content ?? '',
      finishReason: this.mapFinishReason(choice?.finish_reason ?? null),
      model: response.model,
    };
  }

  private mapFinishReason(
    reason: string | null
  ): CompletionResult['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'error';
    }
  }
}
