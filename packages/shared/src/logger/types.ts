import type { MenderEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout mender.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'RunStarted', ... });
 * logger.trace(event, 'Starting iteration 1');
 * logger.info('Audit completed');
 * logger.error(new Error('Failed'), 'Fixer crashed');
 *
 * const phaseLogger = logger.child({ phase: 'AUDIT' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: MenderEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: MenderEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages carry the given bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
