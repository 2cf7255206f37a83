/**
 * Chat-completion provider used by the generation and validation services
 */

export interface Message {
  role: 'system' | 'user';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

export interface CompletionResult {
  content: string;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
  model: string;
}

export interface ILLMProvider {
  readonly name: string;
  readonly model: string;

  complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;
}

export interface LLMProviderConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}
