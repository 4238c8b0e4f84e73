import { describe, it, expect } from 'vitest';
import { CancelledError, TimeoutError } from '@mender/shared';
import { runWithTimeout } from './timeout';

const never = () => new Promise<string>(() => undefined);

describe('runWithTimeout', () => {
  it('returns the result of a fast call', async () => {
    const parent = new AbortController().signal;
    await expect(runWithTimeout('audit', 1000, parent, async () => 'done')).resolves.toBe('done');
  });

  it('rejects with TimeoutError and aborts the inner signal', async () => {
    let inner: AbortSignal | undefined;
    const promise = runWithTimeout('judge', 10, new AbortController().signal, (signal) => {
      inner = signal;
      return never();
    });

    await expect(promise).rejects.toThrow(TimeoutError);
    await expect(promise).rejects.toThrow('judge timed out after 10ms');
    expect(inner?.aborted).toBe(true);
  });

  it('rejects with CancelledError when the parent aborts', async () => {
    const controller = new AbortController();
    const promise = runWithTimeout('fix', 1000, controller.signal, never);
    controller.abort();

    await expect(promise).rejects.toThrow(CancelledError);
  });

  it('does not call the function when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let called = false;

    await expect(
      runWithTimeout('fix', 1000, controller.signal, async () => {
        called = true;
      }),
    ).rejects.toThrow('fix cancelled');
    expect(called).toBe(false);
  });

  it('passes through errors from the call', async () => {
    const parent = new AbortController().signal;
    await expect(
      runWithTimeout('audit', 1000, parent, async () => {
        throw new Error('bad');
      }),
    ).rejects.toThrow('bad');
  });
});
