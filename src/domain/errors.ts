/**
 * Pipeline error taxonomy.
 *
 * Only DecodeFailedError and EmptyEnsembleError reach callers; the others
 * select a fallback (mock prediction, fast-tier-only cache, sync dispatch).
 */

export type PipelineErrorCode =
  | "MODEL_NOT_FOUND"
  | "INFERENCE_FAILED"
  | "DECODE_FAILED"
  | "CACHE_UNAVAILABLE"
  | "QUEUE_UNAVAILABLE"
  | "EMPTY_ENSEMBLE";

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ModelNotFoundError extends PipelineError {
  constructor(
    readonly modelType: string,
    readonly searchedPaths: string[],
  ) {
    super("MODEL_NOT_FOUND", `Model file for ${modelType} not found in: ${searchedPaths.join(", ")}`);
  }
}

export class InferenceFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INFERENCE_FAILED", message, options);
  }
}

export class DecodeFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DECODE_FAILED", message, options);
  }
}

export class CacheUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CACHE_UNAVAILABLE", message, options);
  }
}

export class QueueUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("QUEUE_UNAVAILABLE", message, options);
  }
}

export class EmptyEnsembleError extends PipelineError {
  constructor() {
    super("EMPTY_ENSEMBLE", "No augmentation branch produced a prediction");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
