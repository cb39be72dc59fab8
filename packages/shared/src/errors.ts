/**
 * Error codes used throughout precheck.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProcessError'
  | 'CancelledError'
  | 'CoverageError'
  | 'ReportingError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all precheck errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProcessError', 'go build failed to start', {
 *   cause: originalError,
 *   details: { argv: ['go', 'build', './...'] }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * Raised before any check runs; the run is aborted.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a subprocess cannot be launched.
 * A process that starts and exits non-zero is not an error at this layer.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when work is aborted through an AbortSignal.
 */
export class CancelledError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CancelledError', message, options);
  }
}

/**
 * Error thrown when coverage data cannot be read or parsed.
 */
export class CoverageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CoverageError', message, options);
  }
}

/**
 * Error thrown when uploading coverage to an external service fails.
 */
export class ReportingError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ReportingError', message, options);
  }
}

/**
 * Returns true when the error was caused by an aborted signal, either ours or the
 * platform's `AbortError`.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancelledError) return true;
  return error instanceof Error && error.name === 'AbortError';
}
