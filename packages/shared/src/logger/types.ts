import type { PrecheckEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout precheck.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'ModeStarted', ... });
 *
 * // Standard logging
 * logger.info('Fetching golint');
 * logger.error(new Error('Failed'), 'Coverage upload failed');
 *
 * // Create a child logger with additional context
 * const checkLogger = logger.child({ check: 'coverage' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured precheck event.
   */
  log(event: PrecheckEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, hidden unless verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
