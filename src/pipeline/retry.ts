import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
  backoff: 'fixed' | 'exponential';
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 2000,
  backoff: 'fixed',
};

export function delayForAttempt(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === 'exponential') {
    return policy.delayMs * 2 ** (attempt - 1);
  }
  return policy.delayMs;
}

export interface RetryOptions {
  /** Errors for which this returns false are rethrown without another attempt. */
  retryable?: (err: unknown) => boolean;
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
  onAttempt?: (attempt: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`${errorMessage(lastError)} (after ${attempts} attempt${attempts === 1 ? '' : 's'})`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Run `operation` up to `policy.maxAttempts` times, sleeping between attempts.
 * Stops early if the signal is aborted or the error is not retryable.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let attempt = 0;

  for (;;) {
    attempt++;
    options.onAttempt?.(attempt);
    try {
      return await operation(attempt);
    } catch (err) {
      const retryable = options.retryable?.(err) ?? true;
      const aborted = options.signal?.aborted ?? false;

      if (!retryable) throw err;
      if (attempt >= maxAttempts || aborted) {
        throw new RetryExhaustedError(attempt, err);
      }

      const delay = delayForAttempt(policy, attempt);
      options.logger?.warn(`Attempt ${attempt}/${maxAttempts} failed${options.label ? ` for ${options.label}` : ''}, retrying in ${delay}ms`, {
        error: errorMessage(err),
      });
      if (delay > 0) await sleep(delay);
    }
  }
}
