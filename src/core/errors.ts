export const PIPELINE_ERROR_CODES = Object.freeze({
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  FETCH_FAILED: 'FETCH_FAILED',
  DECODE_FAILED: 'DECODE_FAILED',
  VERSION_NOT_FOUND: 'VERSION_NOT_FOUND',
  PROVISION_FAILED: 'PROVISION_FAILED',
  NOT_READY: 'NOT_READY',
  RESTORE_FAILED: 'RESTORE_FAILED',
  QUERY_FAILED: 'QUERY_FAILED',
  SUBMIT_FAILED: 'SUBMIT_FAILED',
  CLEANUP_FAILED: 'CLEANUP_FAILED',
  UNEXPECTED: 'UNEXPECTED',
} as const);

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[keyof typeof PIPELINE_ERROR_CODES];

export interface PipelineErrorOptions {
  /** Raw output that explains the failure (response body, psql output). */
  readonly detail?: string;
  readonly cause?: unknown;
}

/**
 * Error raised by every stage of the restore run.
 * The code identifies the stage that failed.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly detail?: string;

  constructor(code: PipelineErrorCode, message: string, options: PipelineErrorOptions = {}) {
    super(message, 'cause' in options ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.code = code;
    if (options.detail !== undefined) {
      this.detail = options.detail;
    }
  }
}

export const isPipelineError = (value: unknown): value is PipelineError =>
  value instanceof PipelineError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Wraps an arbitrary thrown value, keeping pipeline errors as they are.
 */
export const toPipelineError = (
  error: unknown,
  code: PipelineErrorCode,
  message: string
): PipelineError => {
  if (isPipelineError(error)) {
    return error;
  }
  return new PipelineError(code, `${message}: ${describeError(error)}`, { cause: error });
};

export const exitCodeFor = (error: PipelineError | null): number => (error ? 1 : 0);
