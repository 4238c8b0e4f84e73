import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@mender/shared';
import type { AdapterContext } from './types';

/**
 * What the LLM workers need from a model provider.
 *
 * `generate` must honour `ctx.abortSignal` and throw the shared error types
 * (RateLimitError, TimeoutError, ConfigError) so retries behave the same for
 * every provider.
 */
export interface ProviderAdapter {
  id(): string;
  capabilities(): ProviderCapabilities;
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
