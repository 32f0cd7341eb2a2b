// src/shared/errors/pipeline.errors.ts
import type { PipelineStage, RunStateSnapshot } from '../../pipeline/pipeline.types';

export type PipelineErrorKind =
  | 'EmptyDocumentError'
  | 'IndexBuildError'
  | 'EmbeddingServiceError'
  | 'GenerationServiceError'
  | 'SchemaValidationExhausted'
  | 'DocumentNotIndexedError'
  | 'Cancelled'
  | 'Timeout';

/**
 * Base class of every failure the pipeline surfaces to a caller.
 *
 * `stage` is filled by the orchestrator when the error crosses a stage
 * boundary; components that raise it leave it undefined.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly transient: boolean;

  stage?: PipelineStage;
  run?: RunStateSnapshot;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  toJSON() {
    return {
      error: this.kind,
      stage: this.stage ?? null,
      message: this.message,
    };
  }
}

export class EmptyDocumentError extends PipelineError {
  readonly kind = 'EmptyDocumentError';
  readonly transient = false;

  constructor(documentId: string, options?: { cause?: unknown }) {
    super(`Document "${documentId}" contains no extractable text`, options);
  }
}

export class IndexBuildError extends PipelineError {
  readonly kind = 'IndexBuildError';
  readonly transient = false;

  readonly conflict: boolean;

  constructor(message: string, options: { conflict?: boolean; cause?: unknown } = {}) {
    super(message, options);
    this.conflict = options.conflict ?? false;
  }
}

export class EmbeddingServiceError extends PipelineError {
  readonly kind = 'EmbeddingServiceError';
  readonly transient = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class GenerationServiceError extends PipelineError {
  readonly kind = 'GenerationServiceError';
  readonly transient = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SchemaValidationExhausted extends PipelineError {
  readonly kind = 'SchemaValidationExhausted';
  readonly transient = false;

  constructor(
    readonly attempts: number,
    readonly violations: string[],
  ) {
    super(
      `Generated answer failed schema validation after ${attempts} attempt(s): ${violations.join('; ')}`,
    );
  }

  override toJSON() {
    return { ...super.toJSON(), violations: this.violations };
  }
}

export class DocumentNotIndexedError extends PipelineError {
  readonly kind = 'DocumentNotIndexedError';
  readonly transient = false;

  constructor(readonly documentId: string) {
    super(`Document "${documentId}" has not been indexed`);
  }
}

export class CancelledError extends PipelineError {
  readonly kind = 'Cancelled';
  readonly transient = false;

  constructor(what = 'operation') {
    super(`The ${what} was cancelled`);
  }
}

export class TimeoutError extends PipelineError {
  readonly kind = 'Timeout';
  readonly transient = true;

  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  const msg = err instanceof Error ? err.message : String(err);
  return msg.slice(0, 4000);
}
