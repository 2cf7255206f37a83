/**
 * Stage 1: Analysis
 *
 * Produces the metadata shared by every chunk:
 * - Entity dictionary (terms that must translate consistently)
 * - Style guide
 *
 * Caller-supplied content is used verbatim; anything missing is generated
 * from a preview of the document.
 */

import type { IArtifactStore } from '../interfaces/artifact-store.js';
import type { GenerationService } from '../interfaces/services.js';
import type { MetadataOrigin } from '../types/glossary.js';
import type { SessionKeys } from '../pipeline/artifact-keys.js';
import { createEntityExtractionPrompt, createStyleExtractionPrompt } from '../prompts/system/analyzer.js';
import { GlossaryManager } from '../glossary/glossary-manager.js';
import { asGenerationFailure } from '../errors.js';
import { throwIfCancelled } from '../utils/concurrency.js';

export interface AnalyzeStageInput {
  text: string;
  targetLanguage: string;
  previewSize: number;
  temperature: number;
  keys: SessionKeys;
  entities?: string;
  style?: string;
  resume?: boolean;
  signal?: AbortSignal;
}

interface ResolvedMetadata {
  content: string;
  origin: MetadataOrigin;
}

export class AnalyzeStage {
  private generation: GenerationService;
  private store: IArtifactStore;

  constructor(generation: GenerationService, store: IArtifactStore) {
    this.generation = generation;
    this.store = store;
  }

  async execute(input: AnalyzeStageInput): Promise<GlossaryManager> {
    const preview = input.text.slice(0, input.previewSize);

    const [entities, style] = await Promise.all([
      this.resolve(input, input.entities, input.keys.entities(), () =>
        createEntityExtractionPrompt(preview, input.targetLanguage)
      ),
      this.resolve(input, input.style, input.keys.style(), () =>
        createStyleExtractionPrompt(preview, input.targetLanguage)
      ),
    ]);

    const glossary = GlossaryManager.create({
      entities: entities.content,
      style: style.content,
      entitiesOrigin: entities.origin,
      styleOrigin: style.origin,
    });

    console.log(
      `[AnalyzeStage] Metadata ready: entities ${entities.origin} (${glossary.terms.length} terms), style ${style.origin}`
    );

    return glossary;
  }

  private async resolve(
    input: AnalyzeStageInput,
    provided: string | undefined,
    key: string,
    buildPrompt: () => string
  ): Promise<ResolvedMetadata> {
    if (provided !== undefined && provided.trim().length > 0) {
      await this.store.put(key, provided);
      return { content: provided, origin: 'provided' };
    }

    if (input.resume && (await this.store.exists(key))) {
      console.log(`[AnalyzeStage] Reusing ${key}`);
      return { content: await this.store.getText(key), origin: 'extracted' };
    }

    throwIfCancelled(input.signal);
    const content = await this.generation.generate(buildPrompt(), input.temperature).catch((error: unknown) => {
      throw asGenerationFailure(error, { key });
    });
    await this.store.put(key, content);
    return { content, origin: 'extracted' };
  }
}
