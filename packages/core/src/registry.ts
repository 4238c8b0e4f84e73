import { ConfigError, type Config, type ProviderConfig } from '@mender/shared';
import { FakeAdapter, OpenAIAdapter, type ProviderAdapter } from '@mender/adapters';
import type { ProviderCallOptions } from './workers/context';

/**
 * Factory function type for creating provider adapters.
 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter;

/**
 * Creates and caches provider adapters by the provider names in config.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry(config);
 * registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
 * const adapter = registry.getAdapter('main');
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();
  private adapters = new Map<string, ProviderAdapter>();

  constructor(
    private readonly config: Config,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  registerFactory(type: string, factory: AdapterFactory): void {
    this.factories.set(type, factory);
  }

  /**
   * @throws {ConfigError} If the provider is not configured, its type has no
   * factory, or its `api_key_env` variable is unset.
   */
  getAdapter(providerId: string): ProviderAdapter {
    const cached = this.adapters.get(providerId);
    if (cached) {
      return cached;
    }

    const providerConfig = this.providerConfig(providerId);

    const factory = this.factories.get(providerConfig.type);
    if (!factory) {
      throw new ConfigError(
        `Unknown provider type '${providerConfig.type}' for provider '${providerId}'`,
      );
    }

    let resolvedConfig = providerConfig;
    if (providerConfig.api_key_env && !providerConfig.api_key) {
      const fromEnv = this.env[providerConfig.api_key_env];
      if (!fromEnv) {
        throw new ConfigError(
          `Missing environment variable '${providerConfig.api_key_env}' for provider '${providerId}'`,
        );
      }
      resolvedConfig = { ...providerConfig, api_key: fromEnv };
    }

    const adapter = factory(resolvedConfig);
    this.adapters.set(providerId, adapter);
    return adapter;
  }

  /** Timeout and retry settings the workers pass with each request. */
  callOptions(providerId: string): ProviderCallOptions {
    const { timeoutMs, retry } = this.providerConfig(providerId);
    return { timeoutMs, retryOptions: retry };
  }

  private providerConfig(providerId: string): ProviderConfig {
    const providerConfig = this.config.providers[providerId];
    if (!providerConfig) {
      const known = Object.keys(this.config.providers);
      throw new ConfigError(
        `Provider '${providerId}' not found. Configured providers: ${known.length > 0 ? known.join(', ') : '(none)'}`,
      );
    }
    return providerConfig;
  }
}

/** A registry with the built-in `openai` and `fake` provider types. */
export function createDefaultRegistry(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
): ProviderRegistry {
  const registry = new ProviderRegistry(config, env);
  registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg, env));
  registry.registerFactory('fake', (cfg) => FakeAdapter.fromConfig(cfg));
  return registry;
}
