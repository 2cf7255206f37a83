/**
 * Translation Service - runs pipeline sessions in the background and keeps
 * their records in the session database for polling
 */

import path from 'path';
import type { AppConfig } from '../config.js';
import type { IArtifactStore } from '../engine/interfaces/artifact-store.js';
import type { GenerationService, ValidationService } from '../engine/interfaces/services.js';
import type { TranslationSession } from '../engine/types/common.js';
import type { PipelineResult } from '../engine/types/pipeline.js';
import { TranslationPipeline, type DocumentSource, type ExecuteOptions } from '../engine/pipeline/translation-pipeline.js';
import { SessionKeys } from '../engine/pipeline/artifact-keys.js';
import { ConfigurationError, DecodeError, errorMessage } from '../engine/errors.js';
import { createCodecRegistry, type CodecRegistry } from './import/index.js';
import {
  createSessionRecord,
  getAllSessions,
  getSession,
  setSessionArtifacts,
  updateSessionState,
  type SessionRecord,
} from '../storage/database.js';

export interface SessionOverrides {
  maxChunkSize?: number;
  maxChunkCount?: number;
  metadataPreviewSize?: number;
  temperature?: number;
  validationEnabled?: boolean;
  concurrency?: number;
}

export type SessionSourceInput =
  | { kind: 'upload'; bytes: Buffer; filename: string }
  | { kind: 'path'; path: string };

export interface StartSessionInput {
  targetLanguage: string;
  source: SessionSourceInput;
  overrides?: SessionOverrides;
  entities?: string;
  style?: string;
}

export interface ArtifactLink {
  key: string;
  uri: string;
  url: string;
}

export interface TranslationServiceDeps {
  config: AppConfig;
  store: IArtifactStore;
  generation: GenerationService | null;
  validation: ValidationService | null;
  codecs?: CodecRegistry;
}

interface RunningSession {
  controller: AbortController;
  done: Promise<void>;
}

export class TranslationService {
  private config: AppConfig;
  private store: IArtifactStore;
  private generation: GenerationService | null;
  private validation: ValidationService | null;
  private codecs: CodecRegistry;
  private running = new Map<string, RunningSession>();

  constructor(deps: TranslationServiceDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.generation = deps.generation;
    this.validation = deps.validation;
    this.codecs = deps.codecs ?? createCodecRegistry();
  }

  get storeName(): string {
    return this.store.name;
  }

  /**
   * Create a session record and start its pipeline run in the background
   */
  async start(input: StartSessionInput): Promise<SessionRecord> {
    if (!this.generation) {
      throw new ConfigurationError('OpenAI API key is not configured');
    }

    const sourcePath = input.source.kind === 'path' ? this.resolveSourcePath(input.source.path) : undefined;
    const filename = path.basename(input.source.kind === 'upload' ? input.source.filename : input.source.path);
    if (!this.codecs.isSupported(filename)) {
      throw new DecodeError(`Unsupported file format: ${filename}`, { filename });
    }

    const translation = this.config.translation;
    const overrides = input.overrides ?? {};
    const session = TranslationPipeline.createSession({
      sourceRef: sourcePath ?? filename,
      targetLanguage: input.targetLanguage,
      maxChunkSize: overrides.maxChunkSize ?? translation.maxChunkSize,
      maxChunkCount: overrides.maxChunkCount ?? translation.maxChunkCount,
      metadataPreviewSize: overrides.metadataPreviewSize ?? translation.metadataPreviewSize,
      model: this.config.openai.model,
      temperature: overrides.temperature ?? translation.temperature,
      validationEnabled: overrides.validationEnabled ?? translation.enableValidation,
      concurrency: overrides.concurrency ?? translation.concurrency,
    });

    const record = await createSessionRecord(session, filename);

    const source: DocumentSource =
      input.source.kind === 'upload'
        ? { kind: 'buffer', bytes: input.source.bytes, filename }
        : { kind: 'file', path: sourcePath ?? input.source.path };

    this.run(session, { source, entities: input.entities, style: input.style });
    return record;
  }

  /**
   * Run a failed session again from its stored source, reusing every chunk
   * artifact the previous run finished
   */
  async resume(id: string): Promise<SessionRecord | undefined> {
    const record = await getSession(id);
    if (!record) return undefined;

    if (this.running.has(id)) {
      throw new ConfigurationError(`Session ${id} is still running`);
    }
    if (record.state.stage !== 'Failed') {
      throw new ConfigurationError(`Only failed sessions can be resumed (session is ${record.state.stage})`);
    }

    const keys = new SessionKeys(id);
    this.run(record.session, {
      source: { kind: 'artifact', key: keys.source(record.filename) },
      resume: true,
      fallbackChunks: record.state.fallbackChunks,
    });
    return record;
  }

  /**
   * Abort a running session. False when it is not running.
   */
  cancel(id: string): boolean {
    const running = this.running.get(id);
    if (!running) return false;

    running.controller.abort();
    console.log(`[TranslationService] Cancel requested for ${id}`);
    return true;
  }

  isRunning(id: string): boolean {
    return this.running.has(id);
  }

  /**
   * Resolves when the session's current run has finished, either way
   */
  async waitFor(id: string): Promise<void> {
    await this.running.get(id)?.done;
  }

  async get(id: string): Promise<SessionRecord | undefined> {
    return getSession(id);
  }

  async list(): Promise<SessionRecord[]> {
    return getAllSessions();
  }

  /**
   * Every artifact of a session with a time-limited URL
   */
  async artifacts(id: string): Promise<ArtifactLink[] | undefined> {
    const record = await getSession(id);
    if (!record) return undefined;

    const locators = await this.store.listByPrefix(`${new SessionKeys(id).root}/`);
    return Promise.all(
      locators.map(async (locator) => ({
        key: locator.key,
        uri: locator.uri,
        url: await this.store.signedUrl(locator.key, this.config.storage.signedUrlTtlSeconds),
      }))
    );
  }

  /**
   * Resolve a requested source path under the configured source directory
   */
  private resolveSourcePath(requested: string): string {
    const sourceDir = this.config.storage.sourceDir;
    if (!sourceDir) {
      throw new ConfigurationError('Server-side source paths are disabled (SOURCE_DIR is not set)');
    }

    const root = path.resolve(sourceDir);
    const resolved = path.resolve(root, requested);
    const relative = path.relative(root, resolved);
    if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new DecodeError(`Source path is outside the source directory: ${requested}`, { sourcePath: requested });
    }
    return resolved;
  }

  private run(
    session: TranslationSession,
    options: Omit<ExecuteOptions, 'signal'> & { source: DocumentSource }
  ): void {
    const controller = new AbortController();
    const pipeline = new TranslationPipeline({
      store: this.store,
      generation: this.generation,
      validation: this.validation,
      codecs: this.codecs,
      onStateChange: async (state) => {
        await updateSessionState(session.id, state);
      },
    });

    const done = pipeline
      .execute(session, { ...options, signal: controller.signal })
      .then((result: PipelineResult) => this.recordResult(result))
      .catch((error: unknown) => {
        // The pipeline has already stored the Failed state
        console.error(`[TranslationService] Session ${session.id} ended with error: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running.delete(session.id);
      });

    this.running.set(session.id, { controller, done });
  }

  private async recordResult(result: PipelineResult): Promise<void> {
    await setSessionArtifacts(result.sessionId, {
      finalArtifactKey: result.finalArtifact?.key,
      reencodedArtifactKey: result.reencodedArtifact?.key,
    });
  }
}
