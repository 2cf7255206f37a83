/**
 * Error hierarchy for the translation pipeline
 *
 * Fatal kinds stop the session; ValidationFailure and ReassemblyEncodeFailure
 * are caught at the chunk or reassembly boundary and only reported.
 */

export type ErrorKind =
  | 'ConfigurationError'
  | 'DecodeError'
  | 'ChunkingError'
  | 'GenerationFailure'
  | 'ValidationFailure'
  | 'ReassemblyEncodeFailure'
  | 'Cancelled'
  | 'StorageError'
  | 'Unknown';

export class PipelineError extends Error {
  public readonly kind: ErrorKind;
  public readonly fatal: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    kind: ErrorKind,
    fatal: boolean = true,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.kind = kind;
    this.fatal = fatal;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ConfigurationError', true, context);
  }
}

export class DecodeError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'DecodeError', true, context, { cause });
  }
}

export class ChunkingError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ChunkingError', true, context);
  }
}

export class GenerationFailure extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'GenerationFailure', true, context, { cause });
  }
}

export class ValidationFailure extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'ValidationFailure', false, context, { cause });
  }
}

export class ReassemblyEncodeFailure extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'ReassemblyEncodeFailure', false, context, { cause });
  }
}

export class CancelledError extends PipelineError {
  constructor(message: string = 'Session was cancelled', cause?: unknown) {
    super(message, 'Cancelled', true, undefined, { cause });
  }
}

export class StorageError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'StorageError', true, context, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorKind(error: unknown): ErrorKind {
  return error instanceof PipelineError ? error.kind : 'Unknown';
}

/**
 * Pass pipeline errors through; wrap anything else a generation call threw
 */
export function asGenerationFailure(error: unknown, context?: Record<string, unknown>): PipelineError {
  if (error instanceof PipelineError) return error;
  return new GenerationFailure(`Generation failed: ${errorMessage(error)}`, context, error);
}
