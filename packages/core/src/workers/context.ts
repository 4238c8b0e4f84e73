import type { AdapterContext, RetryOptions } from '@mender/adapters';
import type { WorkerContext } from './types';

/** Per-request settings for the provider behind an LLM worker */
export interface ProviderCallOptions {
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}

export function toAdapterContext(ctx: WorkerContext, options: ProviderCallOptions): AdapterContext {
  return {
    runId: ctx.runId,
    logger: ctx.logger,
    abortSignal: ctx.abortSignal,
    timeoutMs: options.timeoutMs,
    retryOptions: options.retryOptions,
  };
}
