/**
 * Longform translation engine
 *
 * Splits long documents into boundary-aware chunks and runs them through a
 * staged pipeline:
 * 1. Analyze: entity dictionary and style guide
 * 2. Translate: one generation call per chunk
 * 3. Validate: optional review of each chunk, raw text as fallback
 * then reassembles the final document in chunk order.
 *
 * @module longform-translator
 */

// Types
export type { DocumentFormat, TextChunk, TranslationSession, SessionParams } from './types/common.js';
export type { GlossaryTerm, GlossaryMetadata, MetadataOrigin } from './types/glossary.js';
export type {
  PipelineStage,
  SessionStage,
  SessionState,
  SessionCounters,
  SessionError,
  StateListener,
  TranslationRequest,
  TranslationResult,
  ValidationOutcome,
  ReencodeOutcome,
  TruncationInfo,
  PipelineResult,
  PipelineOptions,
} from './types/pipeline.js';
export { PIPELINE_STAGES } from './types/pipeline.js';

// Interfaces
export type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
} from './interfaces/llm-provider.js';
export type { IArtifactStore, ArtifactLocator, ArtifactBody } from './interfaces/artifact-store.js';
export type { GenerationService, ValidationService } from './interfaces/services.js';

// Errors
export {
  PipelineError,
  ConfigurationError,
  DecodeError,
  ChunkingError,
  GenerationFailure,
  ValidationFailure,
  ReassemblyEncodeFailure,
  CancelledError,
  StorageError,
  errorKind,
  errorMessage,
  type ErrorKind,
} from './errors.js';

// Providers
export { OpenAIProvider, DEFAULT_OPENAI_MODEL } from './providers/openai.js';
export { ProviderGenerationService } from './providers/generation-service.js';
export { ProviderValidationService } from './providers/validation-service.js';

// Glossary
export { GlossaryManager, parseEntityDictionary } from './glossary/glossary-manager.js';

// Pipeline
export {
  TranslationPipeline,
  type PipelineDependencies,
  type DocumentSource,
  type ExecuteOptions,
} from './pipeline/translation-pipeline.js';
export { SessionTracker } from './pipeline/session-tracker.js';
export { SessionKeys, basenameOf } from './pipeline/artifact-keys.js';

// Stages
export { AnalyzeStage } from './stages/stage-1-analyze.js';
export { TranslateStage } from './stages/stage-2-translate.js';
export { ValidateStage } from './stages/stage-3-validate.js';

// Utils
export { BoundaryChunker, chunkText } from './utils/chunker.js';
export { mapInParallel } from './utils/concurrency.js';

// Prompts
export { createEntityExtractionPrompt, createStyleExtractionPrompt } from './prompts/system/analyzer.js';
export { createTranslatorPrompt, FORMAT_INSTRUCTIONS } from './prompts/system/translator.js';
export { VALIDATOR_SYSTEM_PROMPT, createValidatorPrompt } from './prompts/system/editor.js';
