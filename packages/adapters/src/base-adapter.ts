import { ConfigError, RateLimitError, TimeoutError } from '@mender/shared';

/**
 * Interface for API error types that have a status code.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Configuration for error type checking in provider adapters.
 * Each provider supplies the checks for its own SDK's error classes.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
  /** Seconds the provider asked to wait before retrying, if it said */
  retryAfterSeconds?: (error: APIErrorLike) => number | undefined;
}

/**
 * Reads a Retry-After header value: either delay-seconds or an HTTP date.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now(),
): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds >= 0 ? seconds : undefined;
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Base class for LLM provider adapters that provides common error mapping logic.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  /**
   * Maps provider-specific errors to the errors `executeProviderRequest` understands:
   * - 429 status -> RateLimitError
   * - 401/403 status -> ConfigError
   * - Timeout errors -> TimeoutError
   * - Other errors -> passed through or wrapped
   */
  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, {
          cause: error,
          retryAfter: this.errorConfig.retryAfterSeconds?.(error),
        });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
