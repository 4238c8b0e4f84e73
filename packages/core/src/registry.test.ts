import { describe, it, expect } from 'vitest';
import { ConfigError, ConfigSchema, type ModelResponse, type ProviderCapabilities } from '@mender/shared';
import { FakeAdapter, OpenAIAdapter, type ProviderAdapter } from '@mender/adapters';
import { ProviderRegistry, createDefaultRegistry } from './registry';

class MockAdapter implements ProviderAdapter {
  constructor(readonly apiKey?: string) {}
  id() {
    return 'mock';
  }
  capabilities(): ProviderCapabilities {
    return { supportsJsonMode: false, latencyClass: 'fast', requiresApiKey: false };
  }
  async generate(): Promise<ModelResponse> {
    return {};
  }
}

const config = ConfigSchema.parse({
  providers: {
    local: { type: 'fake', model: 'fake-model', timeoutMs: 5000, retry: { maxRetries: 1 } },
    keyed: { type: 'openai', model: 'gpt-4o', api_key_env: 'MENDER_TEST_KEY' },
  },
});

describe('ProviderRegistry', () => {
  it('creates adapters through the registered factory and caches them', () => {
    const registry = new ProviderRegistry(config);
    let created = 0;
    registry.registerFactory('fake', () => {
      created++;
      return new MockAdapter();
    });

    const first = registry.getAdapter('local');
    const second = registry.getAdapter('local');

    expect(first).toBe(second);
    expect(created).toBe(1);
  });

  it('lists configured providers when the name is unknown', () => {
    const registry = new ProviderRegistry(config);

    expect(() => registry.getAdapter('missing')).toThrow(
      "Provider 'missing' not found. Configured providers: local, keyed",
    );
  });

  it('throws for a provider type without a factory', () => {
    const registry = new ProviderRegistry(config);

    expect(() => registry.getAdapter('local')).toThrow(
      "Unknown provider type 'fake' for provider 'local'",
    );
  });

  it('resolves api_key_env before calling the factory', () => {
    const registry = new ProviderRegistry(config, { MENDER_TEST_KEY: 'test-secret' });
    registry.registerFactory('openai', (cfg) => new MockAdapter(cfg.api_key));

    const adapter = registry.getAdapter('keyed');

    expect(adapter).toBeInstanceOf(MockAdapter);
    expect(adapter instanceof MockAdapter && adapter.apiKey).toBe('test-secret');
  });

  it('throws a ConfigError when the key variable is unset', () => {
    const registry = new ProviderRegistry(config, {});
    registry.registerFactory('openai', () => new MockAdapter());

    expect(() => registry.getAdapter('keyed')).toThrow(ConfigError);
    expect(() => registry.getAdapter('keyed')).toThrow(
      "Missing environment variable 'MENDER_TEST_KEY' for provider 'keyed'",
    );
  });

  it('returns per-provider call options', () => {
    const registry = new ProviderRegistry(config);

    expect(registry.callOptions('local')).toEqual({ timeoutMs: 5000, retryOptions: { maxRetries: 1 } });
    expect(registry.callOptions('keyed')).toEqual({ timeoutMs: undefined, retryOptions: undefined });
  });
});

describe('createDefaultRegistry', () => {
  it('registers the openai and fake provider types', () => {
    const registry = createDefaultRegistry(config, { MENDER_TEST_KEY: 'test-secret' });

    expect(registry.getAdapter('local')).toBeInstanceOf(FakeAdapter);
    expect(registry.getAdapter('keyed')).toBeInstanceOf(OpenAIAdapter);
  });
});
