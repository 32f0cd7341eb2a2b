import {
  EmbeddingServiceError,
  IndexBuildError,
  TimeoutError,
} from '../shared/errors/pipeline.errors';
import { withTransientRetry } from './transient-retry';

// lets the retry loop reach its next await
async function flushMicrotasks() {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

describe('withTransientRetry', () => {
  it('retries transient errors until the operation succeeds', async () => {
    const op = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new EmbeddingServiceError('flaky'))
      .mockRejectedValueOnce(new TimeoutError('embedding call', 10))
      .mockResolvedValue('ok');
    const onRetry = jest.fn();

    await expect(withTransientRetry(op, { maxAttempts: 3, baseDelayMs: 0, onRetry })).resolves.toBe('ok');
    expect(op.mock.calls).toEqual([[1], [2], [3]]);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const last = new EmbeddingServiceError('still down');
    const op = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new EmbeddingServiceError('down'))
      .mockRejectedValueOnce(last);

    await expect(withTransientRetry(op, { maxAttempts: 2, baseDelayMs: 0 })).rejects.toBe(last);
    expect(op).toHaveBeenCalledTimes(2);
  });

  it('does not retry structural or foreign errors', async () => {
    const structural = jest.fn().mockRejectedValue(new IndexBuildError('bad vectors'));
    const foreign = jest.fn().mockRejectedValue(new TypeError('bug'));

    await expect(withTransientRetry(structural, { maxAttempts: 5, baseDelayMs: 0 })).rejects.toThrow('bad vectors');
    await expect(withTransientRetry(foreign, { maxAttempts: 5, baseDelayMs: 0 })).rejects.toThrow('bug');
    expect(structural).toHaveBeenCalledTimes(1);
    expect(foreign).toHaveBeenCalledTimes(1);
  });

  it('waits baseDelayMs × attempt between tries', async () => {
    jest.useFakeTimers();
    try {
      const op = jest
        .fn<Promise<string>, [number]>()
        .mockRejectedValueOnce(new EmbeddingServiceError('a'))
        .mockRejectedValueOnce(new EmbeddingServiceError('b'))
        .mockResolvedValue('ok');

      const pending = withTransientRetry(op, { maxAttempts: 3, baseDelayMs: 100 });

      await flushMicrotasks();
      await jest.advanceTimersByTimeAsync(99);
      expect(op).toHaveBeenCalledTimes(1);
      await jest.advanceTimersByTimeAsync(1);
      await flushMicrotasks();
      expect(op).toHaveBeenCalledTimes(2);
      await jest.advanceTimersByTimeAsync(199);
      expect(op).toHaveBeenCalledTimes(2);
      await jest.advanceTimersByTimeAsync(1);
      await flushMicrotasks();
      await expect(pending).resolves.toBe('ok');
      expect(op).toHaveBeenCalledTimes(3);
    } finally {
      jest.useRealTimers();
    }
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const op = jest.fn().mockRejectedValue(new EmbeddingServiceError('down'));

    const pending = withTransientRetry(op, {
      maxAttempts: 3,
      baseDelayMs: 10_000,
      signal: controller.signal,
    });
    await flushMicrotasks();
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'Cancelled' });
    expect(op).toHaveBeenCalledTimes(1);
  });
});
