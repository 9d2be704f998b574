// src/utils/errors.ts — typed error taxonomy for the pipeline stages

export abstract class PipelineError<C extends string = string> extends Error {
  readonly code: C;

  constructor(code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

export type EngineErrorCode = 'engine_unavailable' | 'empty_completion';

/** Raised by an inference engine on connection failure, timeout, or an empty completion. */
export class EngineError extends PipelineError<EngineErrorCode> {}

export type LiveDataErrorCode = 'not_found' | 'upstream_unavailable' | 'malformed_response';

export class LiveDataError extends PipelineError<LiveDataErrorCode> {}

export class RetrievalError extends PipelineError<'retrieval_failed'> {
  constructor(message: string, options?: { cause?: unknown }) {
    super('retrieval_failed', message, options);
  }
}

export type SynthesisErrorCode = EngineErrorCode;

export class SynthesisError extends PipelineError<SynthesisErrorCode> {}

export class EnhancementError extends PipelineError<'enhancement_failed'> {
  constructor(message: string, options?: { cause?: unknown }) {
    super('enhancement_failed', message, options);
  }
}

export class StorageError extends PipelineError<'storage_failed'> {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_failed', message, options);
  }
}

export class EmbeddingError extends PipelineError<'embedding_failed'> {
  constructor(message: string, options?: { cause?: unknown }) {
    super('embedding_failed', message, options);
  }
}

export class TimeoutError extends PipelineError<'timeout'> {
  readonly operation: string;
  readonly ms: number;

  constructor(operation: string, ms: number) {
    super('timeout', `${operation} timed out after ${ms}ms`);
    this.operation = operation;
    this.ms = ms;
  }
}

/**
 * Outcome of a stage that reports failure as a value instead of throwing.
 */
export type Result<T, E extends Error> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}
