import type { FailureCategory } from './failures.js';
import type { PipelineStage } from './types.js';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

export type ExtractionOutcome = 'failed' | 'unusable' | 'encrypted';

export interface ExtractionAttempt {
  strategy: string;
  outcome: ExtractionOutcome;
  message: string;
  characters: number;
  cause?: unknown;
}

export class ExtractionError extends PipelineError {
  constructor(
    message: string,
    code = 'EXTRACTION_FAILED',
    public readonly attempts: readonly ExtractionAttempt[] = [],
  ) {
    super(message, code, attempts.length > 0 ? { attempts: attempts.map(summarizeAttempt) } : undefined);
    this.name = 'ExtractionError';
    Object.setPrototypeOf(this, ExtractionError.prototype);
  }
}

export type NoTextLayerReason = 'no_text' | 'encrypted';

export class NoTextLayerError extends ExtractionError {
  constructor(
    public readonly reason: NoTextLayerReason,
    attempts: readonly ExtractionAttempt[],
  ) {
    super(
      reason === 'encrypted'
        ? 'PDF is password-protected; no readable text layer'
        : 'PDF has no usable text layer (scanned or image-only document)',
      'NO_TEXT_LAYER',
      attempts,
    );
    this.name = 'NoTextLayerError';
    Object.setPrototypeOf(this, NoTextLayerError.prototype);
  }
}

export class PreparationError extends PipelineError {
  constructor(message: string, code = 'INVALID_LIMIT') {
    super(message, code);
    this.name = 'PreparationError';
    Object.setPrototypeOf(this, PreparationError.prototype);
  }
}

export class SummarizationError extends PipelineError {
  constructor(
    message: string,
    public readonly category: FailureCategory,
    public readonly isRetryable: boolean,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'SUMMARIZATION_FAILED', { category, retryable: isRetryable, attempts }, { cause });
    this.name = 'SummarizationError';
    Object.setPrototypeOf(this, SummarizationError.prototype);
  }
}

export class SynthesisError extends PipelineError {
  constructor(
    message: string,
    public readonly chunkIndex: number | null,
    public readonly category: FailureCategory,
    public readonly isRetryable: boolean,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      message,
      'SYNTHESIS_FAILED',
      { chunk_index: chunkIndex, category, retryable: isRetryable, attempts },
      { cause },
    );
    this.name = 'SynthesisError';
    Object.setPrototypeOf(this, SynthesisError.prototype);
  }
}

export class RunCancelledError extends PipelineError {
  constructor(public readonly beforeStage: PipelineStage) {
    super(`Run cancelled before stage ${beforeStage}`, 'RUN_CANCELLED', { before_stage: beforeStage });
    this.name = 'RunCancelledError';
    Object.setPrototypeOf(this, RunCancelledError.prototype);
  }
}

function summarizeAttempt(attempt: ExtractionAttempt): Record<string, unknown> {
  return {
    strategy: attempt.strategy,
    outcome: attempt.outcome,
    message: attempt.message,
    characters: attempt.characters,
  };
}

/** Extracts `isRetryable` from any error in the taxonomy; everything else is final. */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SummarizationError || error instanceof SynthesisError) {
    return error.isRetryable;
  }
  return false;
}
