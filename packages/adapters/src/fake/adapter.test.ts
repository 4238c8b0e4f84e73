import { describe, it, expect } from 'vitest';
import { NoopLogger } from '@mender/shared';
import { FAKE_DEFAULT_REPLY, FakeAdapter } from './adapter';
import type { AdapterContext } from '../types';

describe('FakeAdapter', () => {
  const ctx: AdapterContext = {
    runId: 'test-run',
    logger: new NoopLogger(),
    retryOptions: { maxRetries: 0 },
  };
  const ask = (content: string) => ({ messages: [{ role: 'user' as const, content }] });

  it('answers with the default reply when unscripted', async () => {
    const adapter = new FakeAdapter();
    await expect(adapter.generate(ask('audit'), ctx)).resolves.toEqual({
      text: FAKE_DEFAULT_REPLY,
    });
  });

  it('consumes a list script in order and repeats the last entry', async () => {
    const adapter = FakeAdapter.fromConfig({ type: 'fake', model: 'fake', responses: ['a', 'b'] });

    const texts = [];
    for (let i = 0; i < 3; i++) {
      texts.push((await adapter.generate(ask(`q${i}`), ctx)).text);
    }

    expect(texts).toEqual(['a', 'b', 'b']);
    expect(adapter.requests.map((r) => r.messages[0].content)).toEqual(['q0', 'q1', 'q2']);
  });

  it('lets a responder fail a call', async () => {
    const adapter = new FakeAdapter((_req, index) =>
      index === 0 ? new Error('provider down') : 'ok',
    );

    await expect(adapter.generate(ask('x'), ctx)).rejects.toThrow('provider down');
    await expect(adapter.generate(ask('x'), ctx)).resolves.toEqual({ text: 'ok' });
  });

  it('refuses to answer once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const adapter = new FakeAdapter(['never']);

    await expect(
      adapter.generate(ask('x'), { ...ctx, abortSignal: controller.signal }),
    ).rejects.toThrow();
    expect(adapter.requests).toHaveLength(0);
  });

  it('reports capabilities', () => {
    expect(new FakeAdapter().capabilities()).toEqual({
      supportsJsonMode: true,
      latencyClass: 'fast',
      requiresApiKey: false,
    });
  });
});
