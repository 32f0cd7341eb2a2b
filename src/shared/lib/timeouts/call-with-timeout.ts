// src/shared/lib/timeouts/call-with-timeout.ts
import { CancelledError, TimeoutError } from '../../errors/pipeline.errors';

/**
 * Runs `fn` with its own AbortSignal that fires when either `timeoutMs`
 * elapses or the parent `signal` aborts. Rejects with TimeoutError or
 * CancelledError respectively; the pending call is abandoned either way.
 */
export function callWithTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError(label));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onParentAbort);
      action();
    };

    const onParentAbort = () => {
      controller.abort();
      finish(() => reject(new CancelledError(label)));
    };

    const timeoutId = setTimeout(() => {
      controller.abort();
      finish(() => reject(new TimeoutError(label, timeoutMs)));
    }, timeoutMs);

    signal?.addEventListener('abort', onParentAbort, { once: true });

    fn(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

/** Resolves after `ms`, or rejects with CancelledError if `signal` aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError('retry back-off'));
  }
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new CancelledError('retry back-off'));
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Waits on a promise this caller does not own. Abort rejects with
 * CancelledError at once; the promise itself keeps running.
 */
export function untilAborted<T>(promise: Promise<T>, label: string, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new CancelledError(label));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError(label));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
