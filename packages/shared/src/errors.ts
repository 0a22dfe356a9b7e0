/**
 * Error codes used throughout treedigest.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1, except process failures which keep the tool's own code.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  // Runtime errors
  | 'MissingToolError'
  | 'ProcessError'
  | 'IndexError'
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
 * Base error class for all treedigest errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('IndexError', 'Could not write index', {
 *   cause: originalError,
 *   details: { indexPath },
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
 * Error thrown when configuration is invalid or missing, including a root that is not a directory.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when the ingestion executable cannot be located.
 */
export class MissingToolError extends AppError {
  /** Name or path of the executable that was looked up */
  public readonly executable: string;

  constructor(executable: string, options: AppErrorOptions = {}) {
    super('MissingToolError', `Executable "${executable}" was not found on PATH.`, options);
    this.executable = executable;
  }
}

/**
 * Error thrown when a subprocess fails.
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
 * Error thrown when the digest index cannot be written.
 */
export class IndexError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('IndexError', message, options);
  }
}
