import { ConfigError, RateLimitError, TimeoutError, isRecord } from '@mender/shared';
import type { AdapterContext, RetryOptions } from '../types';

/**
 * Default retry options for provider API requests.
 *
 * ## Retry Strategy
 *
 * The retry mechanism uses exponential backoff with jitter:
 *
 * - **maxRetries**: Maximum number of retry attempts (default: 3)
 * - **initialDelayMs**: Starting delay between retries (default: 1000ms)
 * - **maxDelayMs**: Cap on delay to prevent excessive waits (default: 10000ms)
 * - **backoffFactor**: Multiplier for exponential growth (default: 2x)
 *
 * ## Retriable Errors
 *
 * - `RateLimitError` (HTTP 429)
 * - `TimeoutError`
 * - Server errors (HTTP 5xx)
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED)
 *
 * ## Non-Retriable Errors
 *
 * - `ConfigError` (HTTP 401, 403)
 * - Client errors (HTTP 4xx except 429)
 * - Abort signals (user cancellation)
 *
 * ## Delay Calculation
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * finalDelay = max(0, delay + jitter)
 * ```
 */
export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

const RETRIABLE_NETWORK_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED']);

function readStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const status = error.status ?? error.statusCode;
  return typeof status === 'number' ? status : undefined;
}

function readCode(error: unknown): string | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.code === 'string') return error.code;
  const cause = error.cause;
  if (isRecord(cause) && typeof cause.code === 'string') return cause.code;
  return undefined;
}

/**
 * Determines if an error is safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = readCode(error);
  return code !== undefined && RETRIABLE_NETWORK_CODES.has(code);
}

function backoffDelay(attempt: number, options: Required<RetryOptions>): number {
  const delay = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1),
  );
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

/**
 * Delay before the next attempt. A Retry-After from the provider is honoured
 * even when it exceeds the backoff cap.
 */
export function retryDelay(
  error: unknown,
  attempt: number,
  options: Required<RetryOptions>,
): number {
  const backoff = backoffDelay(attempt, options);
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return Math.max(backoff, error.retryAfter * 1000);
  }
  return backoff;
}

/**
 * Executes a provider request with automatic retry, timeout, and abort handling.
 *
 * Every adapter routes its SDK call through here so that retry policy lives at
 * the adapter boundary and never in the workers.
 *
 * ```typescript
 * const completion = await executeProviderRequest(ctx, 'openai', 'gpt-4o-mini', (signal) =>
 *   client.chat.completions.create({ ... }, { signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const options: Required<RetryOptions> = {
    ...DEFAULT_RETRY_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: { provider, model },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= options.maxRetries) {
    const abortController = new AbortController();
    const abortHandler = () => abortController.abort(ctx.abortSignal?.reason);

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortHandler();
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`));
      }, ctx.timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);

      await ctx.logger.log({
        type: 'ProviderRequestFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: ctx.runId,
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      lastError = error;

      // User cancellation is never retried.
      if (ctx.abortSignal?.aborted) {
        throw error;
      }

      if (error instanceof ConfigError) {
        break;
      }

      if (!isRetriableError(error) || attempts >= options.maxRetries) {
        break;
      }

      attempts++;
      await new Promise((resolve) => setTimeout(resolve, retryDelay(error, attempts, options)));
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      ctx.abortSignal?.removeEventListener('abort', abortHandler);
    }
  }

  await ctx.logger.log({
    type: 'ProviderRequestFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}
