// src/pipeline/transient-retry.ts
import { CancelledError, isPipelineError } from '../shared/errors/pipeline.errors';
import { sleep } from '../shared/lib/timeouts/call-with-timeout';

export interface TransientRetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number) => void | Promise<void>;
}

/**
 * Retries `op` while it fails with a transient pipeline error, waiting
 * `baseDelayMs × attempt` between tries. Anything else, or the last
 * transient failure, propagates unchanged.
 */
export async function withTransientRetry<T>(
  op: (attempt: number) => Promise<T>,
  { maxAttempts, baseDelayMs, signal, onRetry }: TransientRetryOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw new CancelledError();
    try {
      return await op(attempt);
    } catch (e: unknown) {
      const retryable = isPipelineError(e) && e.transient && !signal?.aborted;
      if (!retryable || attempt >= maxAttempts) throw e;
      await onRetry?.(e, attempt);
      await sleep(baseDelayMs * attempt, signal);
    }
  }
}
