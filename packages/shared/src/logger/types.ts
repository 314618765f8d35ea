import type { BenchEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout configbench.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'AttemptRecorded', ... });
 *
 * // Standard logging
 * logger.info('Evaluating issue cache-eviction-001');
 * logger.error(new Error('Failed'), 'Could not save run');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ config: 'baseline' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured benchmark event.
   */
  log(event: BenchEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: BenchEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
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
