/**
 * Translation service entry point
 *
 * Integrated with:
 * - LowDB for session records
 * - OpenAI for generation and validation
 * - Local filesystem or Supabase Storage for artifacts
 */

import 'dotenv/config';
import { loadConfig, validateConfig } from './config.js';
import { createApp } from './app.js';
import { initDatabase } from './storage/database.js';
import { createArtifactStore } from './services/storage/index.js';
import { TranslationService } from './services/translation-service.js';
import { OpenAIProvider } from './engine/providers/openai.js';
import { ProviderGenerationService } from './engine/providers/generation-service.js';
import { ProviderValidationService } from './engine/providers/validation-service.js';

async function startServer() {
  // Load configuration
  const config = loadConfig();
  const configValidation = validateConfig(config);
  for (const error of configValidation.errors) {
    console.warn(`[Config] ${error}`);
  }

  await initDatabase({ dataDir: config.storage.dataDir });

  const store = createArtifactStore(config);
  const provider = config.openai.apiKey
    ? new OpenAIProvider({
        apiKey: config.openai.apiKey,
        model: config.openai.model,
        baseUrl: config.openai.baseUrl,
      })
    : null;

  const service = new TranslationService({
    config,
    store,
    generation: provider
      ? new ProviderGenerationService(provider, { maxOutputTokens: config.translation.maxOutputTokens })
      : null,
    validation: provider
      ? new ProviderValidationService(provider, store, { maxOutputTokens: config.translation.maxOutputTokens })
      : null,
  });

  const app = createApp({ config, service });

  app.listen(config.port, () => {
    console.log(`[Server] Listening on http://localhost:${config.port}`);
    console.log(`[Server] Storage: ${store.name}, AI: ${provider ? `OpenAI (${provider.model})` : 'not configured'}`);
  });
}

startServer().catch(console.error);
