/**
 * Translation Pipeline - Orchestrates a chunked document translation
 *
 * Initializing -> MetadataReady -> Chunked -> PromptsBuilt -> Translating
 *   -> Validating (when enabled) -> Reassembling -> Done
 *
 * Any fatal error moves the session to Failed and is rethrown. Every
 * intermediate result is written to the artifact store before the counters
 * move, so a failed run leaves a consistent, resumable prefix behind.
 */

import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import type { IArtifactStore, ArtifactLocator } from '../interfaces/artifact-store.js';
import type { GenerationService, ValidationService } from '../interfaces/services.js';
import type { SessionParams, TextChunk, TranslationSession } from '../types/common.js';
import type { PipelineOptions, PipelineResult, StateListener, TranslationRequest } from '../types/pipeline.js';
import type { GlossaryManager } from '../glossary/glossary-manager.js';
import type { CodecRegistry, DocumentContent } from '../../services/import/index.js';
import { createCodecRegistry } from '../../services/import/index.js';
import { guessContentType } from '../../services/storage/base.js';
import { AnalyzeStage } from '../stages/stage-1-analyze.js';
import { TranslateStage } from '../stages/stage-2-translate.js';
import { ValidateStage } from '../stages/stage-3-validate.js';
import { createTranslatorPrompt } from '../prompts/system/translator.js';
import { BoundaryChunker } from '../utils/chunker.js';
import { mapInParallel, throwIfCancelled } from '../utils/concurrency.js';
import { SessionKeys, basenameOf } from './artifact-keys.js';
import { SessionTracker } from './session-tracker.js';
import {
  ConfigurationError,
  DecodeError,
  PipelineError,
  ReassemblyEncodeFailure,
  errorKind,
  errorMessage,
} from '../errors.js';

/**
 * Where the source document comes from. Defaults to the session's
 * sourceRef read as a local path or file URL.
 */
export type DocumentSource =
  | { kind: 'file'; path: string }
  | { kind: 'buffer'; bytes: Buffer; filename: string }
  | { kind: 'artifact'; key: string };

export interface PipelineDependencies {
  store: IArtifactStore;
  generation?: GenerationService | null;
  validation?: ValidationService | null;
  codecs?: CodecRegistry;
  onStateChange?: StateListener;
}

export interface ExecuteOptions extends PipelineOptions {
  source?: DocumentSource;
}

export class TranslationPipeline {
  private store: IArtifactStore;
  private generation: GenerationService | null;
  private validation: ValidationService | null;
  private codecs: CodecRegistry;
  private onStateChange?: StateListener;

  constructor(deps: PipelineDependencies) {
    this.store = deps.store;
    this.generation = deps.generation ?? null;
    this.validation = deps.validation ?? null;
    this.codecs = deps.codecs ?? createCodecRegistry();
    this.onStateChange = deps.onStateChange;
  }

  /**
   * Create a frozen session, assigning an id when none is given
   */
  static createSession(params: SessionParams): TranslationSession {
    const { id, ...rest } = params;
    return Object.freeze({ ...rest, id: id ?? randomUUID() });
  }

  /**
   * Run one session to Done or Failed
   */
  async execute(session: TranslationSession, options: ExecuteOptions = {}): Promise<PipelineResult> {
    const tracker = new SessionTracker(session.id, this.onStateChange);
    const keys = new SessionKeys(session.id);
    const { signal } = options;

    console.log(`[Pipeline] Session ${session.id}: ${session.sourceRef} -> ${session.targetLanguage}`);

    try {
      // ============ INITIALIZING ============
      const generation = this.checkConfiguration(session);
      const { bytes, filename } = await this.readSource(session, options.source);
      throwIfCancelled(signal);

      const doc = await this.decode(bytes, filename);
      if (!options.source || options.source.kind !== 'artifact') {
        await this.store.put(keys.source(filename), bytes);
      }

      const analyzeStage = new AnalyzeStage(generation, this.store);
      const glossary = await analyzeStage.execute({
        text: doc.text,
        targetLanguage: session.targetLanguage,
        previewSize: session.metadataPreviewSize,
        temperature: session.temperature,
        keys,
        entities: options.entities,
        style: options.style,
        resume: options.resume,
        signal,
      });
      tracker.enter('MetadataReady');

      // ============ CHUNK ============
      const chunks = await this.chunkDocument(session, doc, keys, tracker, signal);
      tracker.enter('Chunked');

      // ============ PROMPTS ============
      await this.buildPrompts(session, doc, glossary, chunks, keys, tracker, signal);
      tracker.enter('PromptsBuilt');

      // ============ TRANSLATE ============
      tracker.enter('Translating');
      const translateStage = new TranslateStage(generation, this.store);
      const translated = await translateStage.execute({
        keys,
        temperature: session.temperature,
        concurrency: session.concurrency,
        tracker,
        resume: options.resume,
        signal,
      });

      // ============ VALIDATE ============
      if (session.validationEnabled) {
        tracker.enter('Validating');
      }
      const validateStage = new ValidateStage(this.validation, this.store);
      const results = await validateStage.execute({
        chunks: translated,
        enabled: session.validationEnabled,
        concurrency: session.concurrency,
        tracker,
        resume: options.resume,
        previousFallbacks: options.fallbackChunks,
        signal,
      });

      // ============ REASSEMBLE ============
      throwIfCancelled(signal);
      tracker.enter('Reassembling');
      const finalArtifact = await this.reassemble(keys, filename);
      const reencodedArtifact = await this.reencode(doc, finalArtifact, keys, tracker);

      tracker.enter('Done');
      await tracker.flush();

      const state = tracker.snapshot();
      console.log(
        `[Pipeline] Session ${session.id} done: ${results.length} chunks, ${state.fallbackChunks.length} fallbacks`
      );

      return {
        sessionId: session.id,
        finalArtifact,
        reencodedArtifact,
        chunkCount: results.length,
        fallbackChunks: state.fallbackChunks,
        truncation: state.truncation,
        state,
      };
    } catch (error) {
      tracker.fail(error);
      await tracker.flush();

      const message = `[Pipeline] Session ${session.id} failed at ${tracker.lastStage} (${errorKind(error)}): ${errorMessage(error)}`;
      if (error instanceof PipelineError && error.kind === 'Cancelled') {
        console.warn(message);
      } else {
        console.error(message);
      }
      throw error;
    }
  }

  private checkConfiguration(session: TranslationSession): GenerationService {
    if (!session.targetLanguage?.trim()) {
      throw new ConfigurationError('Target language is required', { sessionId: session.id });
    }
    if (!session.sourceRef?.trim()) {
      throw new ConfigurationError('Source reference is required', { sessionId: session.id });
    }
    if (!this.generation) {
      throw new ConfigurationError('No generation service configured', { sessionId: session.id });
    }
    if (session.validationEnabled && !this.validation) {
      throw new ConfigurationError('Validation is enabled but no validation service is configured', {
        sessionId: session.id,
      });
    }
    if (!Number.isInteger(session.concurrency) || session.concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${session.concurrency}`);
    }
    if (
      session.maxChunkCount !== undefined &&
      (!Number.isInteger(session.maxChunkCount) || session.maxChunkCount < 1)
    ) {
      throw new ConfigurationError(`Max chunk count must be a positive integer, got ${session.maxChunkCount}`);
    }
    return this.generation;
  }

  private async readSource(
    session: TranslationSession,
    source: DocumentSource | undefined
  ): Promise<{ bytes: Buffer; filename: string }> {
    const resolved: DocumentSource = source ?? { kind: 'file', path: session.sourceRef };

    try {
      switch (resolved.kind) {
        case 'buffer':
          return { bytes: resolved.bytes, filename: basenameOf(resolved.filename) };
        case 'artifact':
          return { bytes: await this.store.get(resolved.key), filename: basenameOf(resolved.key) };
        case 'file': {
          const filePath = resolved.path.startsWith('file:') ? fileURLToPath(resolved.path) : resolved.path;
          return { bytes: await fs.readFile(filePath), filename: basenameOf(filePath) };
        }
      }
    } catch (error) {
      throw new DecodeError(`Cannot read source ${session.sourceRef}: ${errorMessage(error)}`, {
        sourceRef: session.sourceRef,
      }, error);
    }
  }

  private async decode(bytes: Buffer, filename: string): Promise<DocumentContent> {
    try {
      const doc = await this.codecs.decode(bytes, filename);
      console.log(`[Pipeline] Decoded ${filename} as ${doc.format} (${doc.text.length} chars)`);
      return doc;
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new DecodeError(`Failed to decode ${filename}: ${errorMessage(error)}`, { filename }, error);
    }
  }

  private async chunkDocument(
    session: TranslationSession,
    doc: DocumentContent,
    keys: SessionKeys,
    tracker: SessionTracker,
    signal?: AbortSignal
  ): Promise<TextChunk[]> {
    let texts = new BoundaryChunker({ maxChunkSize: session.maxChunkSize }).chunk(doc.text);

    if (session.maxChunkCount !== undefined && texts.length > session.maxChunkCount) {
      const originalCount = texts.length;
      texts = texts.slice(0, session.maxChunkCount);
      tracker.setTruncation({ originalCount, keptCount: texts.length });
      tracker.warn(`Document truncated: ${originalCount} chunks, keeping the first ${texts.length}`);
      console.warn(`[Pipeline] Truncating ${originalCount} chunks to ${texts.length}`);
    }

    const chunks: TextChunk[] = texts.map((content, i) => ({
      index: i + 1,
      content,
      key: keys.originalChunk(i + 1),
    }));

    await mapInParallel(
      chunks,
      session.concurrency,
      async (chunk) => {
        await this.store.put(chunk.key, chunk.content);
        tracker.increment('chunksCreated');
      },
      signal
    );

    console.log(`[Pipeline] ${chunks.length} chunks stored`);
    return chunks;
  }

  private async buildPrompts(
    session: TranslationSession,
    doc: DocumentContent,
    glossary: GlossaryManager,
    chunks: TextChunk[],
    keys: SessionKeys,
    tracker: SessionTracker,
    signal?: AbortSignal
  ): Promise<void> {
    await mapInParallel(
      chunks,
      session.concurrency,
      async (chunk) => {
        const request: TranslationRequest = {
          index: chunk.index,
          total: chunks.length,
          prompt: createTranslatorPrompt({
            targetLanguage: session.targetLanguage,
            format: doc.format,
            entities: glossary.entities,
            style: glossary.style,
            chunk: chunk.content,
            chunkNumber: chunk.index,
            totalChunks: chunks.length,
          }),
        };
        await this.store.put(keys.prompt(request.index), request.prompt);
        tracker.increment('promptsBuilt');
      },
      signal
    );
  }

  /**
   * Concatenate final chunks in key order, verbatim
   */
  private async reassemble(keys: SessionKeys, filename: string): Promise<ArtifactLocator> {
    const finals = await this.store.listByPrefix(keys.finalPrefix());
    const parts: string[] = [];
    for (const locator of finals) {
      parts.push(await this.store.getText(locator));
    }

    const key = keys.finalDocument(filename);
    const locator = await this.store.put(key, parts.join(''), guessContentType(key));
    console.log(`[Pipeline] Final document: ${locator.key} (${finals.length} chunks)`);
    return locator;
  }

  /**
   * Structural encode for formats that need one. Failures are reported, not thrown.
   */
  private async reencode(
    doc: DocumentContent,
    finalArtifact: ArtifactLocator,
    keys: SessionKeys,
    tracker: SessionTracker
  ): Promise<ArtifactLocator | null> {
    if (!this.codecs.requiresReassembly(doc.format)) {
      return null;
    }

    try {
      const translatedText = await this.store.getText(finalArtifact);
      const encoded = await this.codecs.encode(translatedText, doc);
      if (!encoded) {
        tracker.setReencode({ attempted: true, succeeded: true });
        return null;
      }

      const locator = await this.store.put(keys.artifact(encoded.name), encoded.body, encoded.contentType);
      tracker.setReencode({ attempted: true, succeeded: true, artifactKey: locator.key });
      console.log(`[Pipeline] Re-encoded ${doc.format} document: ${locator.key}`);
      return locator;
    } catch (error) {
      const failure = new ReassemblyEncodeFailure(
        `Failed to re-encode ${doc.format} document: ${errorMessage(error)}`,
        { format: doc.format },
        error
      );
      console.warn(`[Pipeline] ${failure.message}`);
      tracker.warn(`${failure.kind}: ${failure.message}`);
      tracker.setReencode({ attempted: true, succeeded: false, error: failure.message });
      return null;
    }
  }
}
