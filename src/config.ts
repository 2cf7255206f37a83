/**
 * Configuration management for the translation service
 */

import { DEFAULT_SIGNED_URL_TTL } from './services/storage/base.js';

export type StorageBackend = 'filesystem' | 'supabase';

export interface AppConfig {
  // Server
  port: number;

  // AI Provider
  openai: {
    apiKey: string;
    model: string;
    baseUrl?: string;
  };

  // Translation settings
  translation: {
    maxChunkSize: number;
    maxChunkCount?: number;
    metadataPreviewSize: number;
    temperature: number;
    maxOutputTokens: number;
    concurrency: number;
    enableValidation: boolean;
  };

  // Storage
  storage: {
    backend: StorageBackend;
    artifactsDir: string;
    dataDir: string;
    sourceDir?: string;           // Root for server-side source paths; unset disables them
    signedUrlTtlSeconds: number;
  };

  supabase: {
    url: string;
    serviceRoleKey: string;
    bucket: string;
  };
}

type Env = Record<string, string | undefined>;

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return parseInt(value, 10);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseInt(env.PORT ?? '3000', 10),

    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_MODEL ?? 'gpt-4o-mini',
      baseUrl: env.OPENAI_BASE_URL || undefined,
    },

    translation: {
      maxChunkSize: parseInt(env.MAX_CHUNK_SIZE ?? '30000', 10),
      maxChunkCount: parseOptionalInt(env.MAX_NUMBER_OF_CHUNKS),
      metadataPreviewSize: parseInt(env.METADATA_PREVIEW_SIZE ?? '30000', 10),
      temperature: parseFloat(env.TRANSLATION_TEMPERATURE ?? '1.0'),
      maxOutputTokens: parseInt(env.MAX_OUTPUT_TOKENS ?? '8192', 10),
      concurrency: parseInt(env.TRANSLATION_CONCURRENCY ?? '4', 10),
      enableValidation: env.ENABLE_VALIDATION !== 'false',
    },

    storage: {
      backend: env.STORAGE_BACKEND === 'supabase' ? 'supabase' : 'filesystem',
      artifactsDir: env.ARTIFACTS_DIR ?? './data/artifacts',
      dataDir: env.DATA_DIR ?? './data',
      sourceDir: env.SOURCE_DIR || undefined,
      signedUrlTtlSeconds: parseInt(env.SIGNED_URL_TTL_SECONDS ?? String(DEFAULT_SIGNED_URL_TTL), 10),
    },

    supabase: {
      url: env.SUPABASE_URL ?? '',
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? '',
      bucket: env.SUPABASE_BUCKET ?? 'translations',
    },
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required');
  }

  if (!isPositiveInteger(config.translation.maxChunkSize)) {
    errors.push('MAX_CHUNK_SIZE must be a positive integer');
  }

  if (config.translation.maxChunkCount !== undefined && !isPositiveInteger(config.translation.maxChunkCount)) {
    errors.push('MAX_NUMBER_OF_CHUNKS must be a positive integer');
  }

  if (!isPositiveInteger(config.translation.metadataPreviewSize)) {
    errors.push('METADATA_PREVIEW_SIZE must be a positive integer');
  }

  if (
    Number.isNaN(config.translation.temperature) ||
    config.translation.temperature < 0 ||
    config.translation.temperature > 2
  ) {
    errors.push('TRANSLATION_TEMPERATURE must be between 0 and 2');
  }

  if (!isPositiveInteger(config.translation.maxOutputTokens)) {
    errors.push('MAX_OUTPUT_TOKENS must be a positive integer');
  }

  if (!isPositiveInteger(config.translation.concurrency)) {
    errors.push('TRANSLATION_CONCURRENCY must be a positive integer');
  }

  if (config.storage.backend === 'supabase' && (!config.supabase.url || !config.supabase.serviceRoleKey)) {
    errors.push('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase storage backend');
  }

  if (!isPositiveInteger(config.storage.signedUrlTtlSeconds)) {
    errors.push('SIGNED_URL_TTL_SECONDS must be a positive integer');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if AI provider is configured
 */
export function hasAIProvider(config: AppConfig): boolean {
  return Boolean(config.openai.apiKey);
}
