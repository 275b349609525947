import type { PipelineEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Interface for logging throughout the pipeline.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventMeta(experiment.id), type: 'BranchAllocated', payload });
 *
 * // Standard logging
 * logger.info('Cloned acme/web');
 * logger.error(err, 'Pull request creation failed');
 *
 * // Create a child logger with additional context
 * const log = logger.child({ experiment: experiment.id, repo: 'acme/web' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured pipeline event.
   */
  log(event: PipelineEvent): MaybePromise<void>;

  /**
   * High-signal event with a human-readable summary.
   */
  trace(event: PipelineEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages carry the given bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
