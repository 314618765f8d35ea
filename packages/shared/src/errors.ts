/**
 * Error codes used throughout configbench.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'CorpusError'
  // Runtime errors (exit code 1)
  | 'TimeoutError'
  | 'ProcessError'
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
 * Base error class for all configbench errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProcessError', 'Judge exited with code 1', {
 *   cause: originalError,
 *   details: { command: 'claude', exitCode: 1 }
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
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when an API is called with arguments it cannot act on.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a corpus file cannot be read or does not match the corpus schema.
 */
export class CorpusError extends AppError {
  /** Path of the offending corpus file */
  public readonly filePath: string;

  constructor(filePath: string, message: string, options: AppErrorOptions = {}) {
    super('CorpusError', `Corpus ${filePath}: ${message}`, options);
    this.filePath = filePath;
  }
}

/**
 * Error thrown when an external process outlives its deadline.
 * Carries whatever output the process produced before it was killed.
 */
export class TimeoutError extends AppError {
  /** The deadline that expired, in milliseconds */
  public readonly timeoutMs: number;
  public readonly partialStdout: string;
  public readonly partialStderr: string;

  constructor(
    message: string,
    options: AppErrorOptions & {
      timeoutMs: number;
      partialStdout?: string;
      partialStderr?: string;
    },
  ) {
    super('TimeoutError', message, options);
    this.timeoutMs = options.timeoutMs;
    this.partialStdout = options.partialStdout ?? '';
    this.partialStderr = options.partialStderr ?? '';
  }
}

/**
 * Error thrown when a subprocess cannot be started or is cancelled.
 * Includes the process exit code when available.
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
 * Extracts a printable message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
