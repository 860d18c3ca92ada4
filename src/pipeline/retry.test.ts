import { describe, it, expect, vi } from 'vitest';
import { ExtractionError } from '../errors.js';
import { DEFAULT_RETRY_POLICY, RetryExhaustedError, delayForAttempt, withRetry, type RetryPolicy } from './retry.js';

const immediate: RetryPolicy = { maxAttempts: 3, delayMs: 0, backoff: 'fixed' };

describe('delayForAttempt', () => {
  it('keeps a fixed delay', () => {
    expect(delayForAttempt(DEFAULT_RETRY_POLICY, 1)).toBe(2000);
    expect(delayForAttempt(DEFAULT_RETRY_POLICY, 3)).toBe(2000);
  });

  it('doubles an exponential delay per attempt', () => {
    const policy: RetryPolicy = { maxAttempts: 5, delayMs: 100, backoff: 'exponential' };
    expect([1, 2, 3, 4].map((n) => delayForAttempt(policy, n))).toEqual([100, 200, 400, 800]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const op = vi.fn().mockRejectedValueOnce(new Error('blip')).mockResolvedValue('rows');
    await expect(withRetry(op, immediate)).resolves.toBe('rows');
    expect(op).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxAttempts and keeps the last error', async () => {
    const op = vi.fn().mockRejectedValue(new ExtractionError('orders', 'connection refused'));
    const err = await withRetry(op, immediate).catch((e: unknown) => e);

    expect(op).toHaveBeenCalledTimes(3);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ attempts: 3, message: 'connection refused (after 3 attempts)' });
  });

  it('rethrows a non-retryable error without another attempt', async () => {
    const fatal = new TypeError('bad row');
    const op = vi.fn().mockRejectedValue(fatal);
    const err = await withRetry(op, immediate, { retryable: (e) => e instanceof ExtractionError }).catch(
      (e: unknown) => e,
    );

    expect(err).toBe(fatal);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('stops retrying once the signal is aborted', async () => {
    const controller = new AbortController();
    const op = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error('blip');
    });

    await expect(withRetry(op, immediate, { signal: controller.signal })).rejects.toThrow('blip (after 1 attempt)');
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('reports every attempt number', async () => {
    const attempts: number[] = [];
    const op = vi.fn().mockRejectedValueOnce(new Error('a')).mockRejectedValueOnce(new Error('b')).mockResolvedValue(1);
    await withRetry(op, immediate, { onAttempt: (n) => attempts.push(n) });
    expect(attempts).toEqual([1, 2, 3]);
  });

  it('treats maxAttempts below one as a single attempt', async () => {
    const op = vi.fn().mockRejectedValue(new Error('nope'));
    await expect(withRetry(op, { maxAttempts: 0, delayMs: 0, backoff: 'fixed' })).rejects.toThrow(RetryExhaustedError);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('waits between attempts', async () => {
    const op = vi.fn().mockRejectedValueOnce(new Error('blip')).mockResolvedValue('ok');
    const started = Date.now();
    await expect(withRetry(op, { maxAttempts: 2, delayMs: 50, backoff: 'fixed' })).resolves.toBe('ok');
    expect(Date.now() - started).toBeGreaterThanOrEqual(45);
    expect(op).toHaveBeenCalledTimes(2);
  });
});
