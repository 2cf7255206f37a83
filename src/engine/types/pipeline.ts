/**
 * Translation pipeline types
 */

import type { ArtifactLocator } from '../interfaces/artifact-store.js';
import type { ErrorKind } from '../errors.js';

export const PIPELINE_STAGES = [
  'Initializing',
  'MetadataReady',
  'Chunked',
  'PromptsBuilt',
  'Translating',
  'Validating',
  'Reassembling',
  'Done',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type SessionStage = PipelineStage | 'Failed';

export interface TranslationRequest {
  index: number;
  total: number;
  prompt: string;
}

export type ValidationOutcome = 'passed' | 'fallback' | 'skipped';

export interface TranslationResult {
  index: number;
  rawText: string;
  validatedText?: string;
  finalText: string;
  validation: ValidationOutcome;
}

export interface SessionCounters {
  chunksCreated: number;
  promptsBuilt: number;
  translationsCompleted: number;
  validationsCompleted: number;
  validationsFailed: number;
}

export interface SessionError {
  kind: ErrorKind;
  message: string;
  stage: PipelineStage;
}

export interface ReencodeOutcome {
  attempted: boolean;
  succeeded: boolean;
  artifactKey?: string;
  error?: string;
}

export interface TruncationInfo {
  originalCount: number;
  keptCount: number;
}

export interface SessionState {
  sessionId: string;
  stage: SessionStage;
  lastStage: PipelineStage;     // Last stage entered, kept when the run fails
  counters: SessionCounters;
  warnings: string[];
  fallbackChunks: number[];
  truncation?: TruncationInfo;
  reencode?: ReencodeOutcome;
  lastError?: SessionError;
  startedAt: string;
  updatedAt: string;
  finishedAt?: string;
}

export type StateListener = (state: SessionState) => void | Promise<void>;

export interface PipelineResult {
  sessionId: string;
  finalArtifact: ArtifactLocator | null;
  reencodedArtifact: ArtifactLocator | null;
  chunkCount: number;
  fallbackChunks: number[];
  truncation?: TruncationInfo;
  state: SessionState;
}

export interface PipelineOptions {
  entities?: string;       // Caller-supplied entity dictionary, used verbatim
  style?: string;          // Caller-supplied style guide, used verbatim
  resume?: boolean;        // Reuse chunk artifacts a previous run already persisted
  fallbackChunks?: readonly number[];  // Chunks a previous run finished on the raw translation
  signal?: AbortSignal;
}
