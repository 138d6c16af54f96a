import type { ErrorCode } from '../0_types.js';

/**
 * Job-level failure. `retryable` decides whether the retry budget applies
 * or the job is failed for good.
 */
export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, retryable?: boolean) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.retryable = retryable ?? (code === 'transient' || code === 'internal');
  }
}

export type ProviderErrorKind =
  | 'rate_limit'
  | 'timeout'
  | 'bad_request'
  | 'server'
  | 'unavailable';

export class TranscriptionProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly status: number | null;

  constructor(kind: ProviderErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'TranscriptionProviderError';
    this.kind = kind;
    this.status = status ?? null;
  }
}

/** Thrown at a job/segment boundary when the worker is asked to stop */
export class JobStoppedError extends Error {
  readonly reason: 'stop' | 'cancelled';

  constructor(reason: 'stop' | 'cancelled', jobId: string) {
    super(
      reason === 'cancelled'
        ? `Job ${jobId} was cancelled`
        : `Job ${jobId} interrupted by shutdown`
    );
    this.name = 'JobStoppedError';
    this.reason = reason;
  }
}

export type UploadErrorCode =
  | 'not_found'
  | 'inactive'
  | 'already_completed'
  | 'invalid_chunk'
  | 'incomplete'
  | 'integrity';

/** Client-facing upload failure; HTTP layers map `code` to a status */
export class UploadError extends Error {
  readonly code: UploadErrorCode;

  constructor(code: UploadErrorCode, message: string) {
    super(message);
    this.name = 'UploadError';
    this.code = code;
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' ||
      ('code' in error && error.code === 'ABORT_ERR'))
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  if (error instanceof TranscriptionProviderError) {
    return new PipelineError('transient', error.message);
  }
  return new PipelineError('internal', errorMessage(error));
}
