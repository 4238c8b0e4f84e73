import { CancelledError, TimeoutError } from '@mender/shared';

/**
 * Runs `fn` under its own abort signal, which fires when `parent` aborts or
 * after `timeoutMs`. The returned promise settles as soon as either happens,
 * even if `fn` ignores its signal.
 */
export async function runWithTimeout<T>(
  label: string,
  timeoutMs: number,
  parent: AbortSignal,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  if (parent.aborted) {
    throw new CancelledError(`${label} cancelled`, { cause: parent.reason });
  }

  const controller = new AbortController();
  let rejectInterrupted: (error: Error) => void = () => undefined;
  const interrupted = new Promise<never>((_resolve, reject) => {
    rejectInterrupted = reject;
  });

  const interrupt = (error: Error) => {
    controller.abort(error);
    rejectInterrupted(error);
  };
  const onParentAbort = () =>
    interrupt(new CancelledError(`${label} cancelled`, { cause: parent.reason }));
  const timer = setTimeout(
    () => interrupt(new TimeoutError(`${label} timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  parent.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', onParentAbort);
  }
}
