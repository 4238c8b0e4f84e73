import type { Logger, RetryConfig } from '@mender/shared';

/** Backoff settings, taken from a provider's `retry` config block. */
export type RetryOptions = RetryConfig;

export interface AdapterContext {
  runId: string;
  logger: Logger;
  abortSignal?: AbortSignal;
  /** Applies to each attempt, not to the retries as a whole */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}
