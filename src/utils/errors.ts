/**
 * Error taxonomy for the conversion pipeline.
 *
 * Every failure carries a stable `code` and a `category` so callers can tell
 * "fix your input" from "try later" from "system misconfigured" without
 * parsing messages.
 */

export type ErrorCategory = 'input' | 'transient' | 'configuration' | 'internal' | 'cancelled';

export type ErrorCode =
  | 'PDF_DECODE_FAILED'
  | 'PDF_PASSWORD_REQUIRED'
  | 'PDF_PASSWORD_INCORRECT'
  | 'IMAGE_ENCODE_FAILED'
  | 'JOB_SUBMISSION_FAILED'
  | 'JOB_FAILED'
  | 'JOB_TIMED_OUT'
  | 'ENGINE_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'CANCELLED'
  | 'CONFIG_INVALID';

export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DecodeError extends PipelineError {
  readonly category = 'input';

  constructor(
    message: string,
    readonly code: 'PDF_DECODE_FAILED' | 'PDF_PASSWORD_REQUIRED' | 'PDF_PASSWORD_INCORRECT' = 'PDF_DECODE_FAILED',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class EncodeError extends PipelineError {
  readonly code = 'IMAGE_ENCODE_FAILED';
  readonly category = 'internal';

  constructor(message: string, readonly pageIndex: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SubmissionError extends PipelineError {
  readonly code = 'JOB_SUBMISSION_FAILED';
  readonly category = 'input';

  constructor(message: string, readonly httpStatus: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A job that ended without a result. `rejected` marks an explicit refusal by
 * the service, which retrying will not fix; request failures stay transient.
 */
export class JobFailedError extends PipelineError {
  readonly code = 'JOB_FAILED';
  readonly category: 'input' | 'transient';
  readonly rejected: boolean;

  constructor(
    message: string,
    readonly jobId: string,
    readonly phase: 'poll' | 'fetch',
    options?: { cause?: unknown; rejected?: boolean }
  ) {
    super(message, options);
    this.rejected = options?.rejected ?? false;
    this.category = this.rejected ? 'input' : 'transient';
  }
}

export class JobTimedOutError extends PipelineError {
  readonly code = 'JOB_TIMED_OUT';
  readonly category = 'transient';

  constructor(readonly jobId: string, readonly polls: number, readonly timeoutMs: number) {
    super(`Job ${jobId} did not finish within ${timeoutMs}ms (${polls} polls)`);
  }
}

export class EngineUnavailableError extends PipelineError {
  readonly code = 'ENGINE_UNAVAILABLE';
  readonly category = 'configuration';

  constructor(readonly engineName: string, options?: { cause?: unknown }) {
    super(`OCR engine "${engineName}" is not available`, options);
  }
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND';
  readonly category = 'input';

  constructor(readonly resource: 'document' | 'engine', readonly id: string) {
    super(`${resource} "${id}" not found`);
  }
}

export class CancelledError extends PipelineError {
  readonly code = 'CANCELLED';
  readonly category = 'cancelled';

  constructor(readonly reason: unknown) {
    super(reason instanceof Error ? `Operation cancelled: ${reason.message}` : 'Operation cancelled', {
      cause: reason,
    });
  }
}

export class ConfigError extends PipelineError {
  readonly code = 'CONFIG_INVALID';
  readonly category = 'configuration';

  constructor(message: string, readonly variables: string[] = []) {
    super(message);
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

/**
 * Flatten an error into log fields.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (isPipelineError(error)) {
    return { error: error.message, code: error.code, category: error.category };
  }
  if (error instanceof Error) {
    return { error: error.message, name: error.name };
  }
  return { error: String(error) };
}
