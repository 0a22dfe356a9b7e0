import type { DigestEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout treedigest.
 * Supports both structured run events and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventBase(runId), type: 'IndexWritten', payload: { ... } });
 *
 * // Log an event together with a progress line for the operator
 * logger.trace(event, '[depth=0] Analyzing /repo as a whole...');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ depth: 1 });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured run event.
   * @param event - The event to log
   */
  log(event: DigestEvent): MaybePromise<void>;

  /**
   * Record an event and print a human-readable summary of it.
   * @param event - The event being traced
   * @param message - Human-readable description
   */
  trace(event: DigestEvent, message: string): MaybePromise<void>;

  /** Log a debug message (only shown in verbose mode) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All messages from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Print debug messages and raw events */
  verbose?: boolean;
}

export function formatBindings(bindings: Record<string, unknown>): string {
  return Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
}
