import { describe, expect, it, vi } from 'vitest';
import { TransientError } from '../../utils/errors.js';
import { backoffDelay, isTransientFailure, withRetry } from '../RetryWrapper.js';

describe('withRetry', () => {
  it('retries transient failures with exponential backoff', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('Request timeout'))
      .mockRejectedValueOnce(new Error('connection reset by peer'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { sleep })).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('fails fast on anything that is not a timeout or connection failure', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('Invalid API key'));

    await expect(withRetry(fn, { sleep })).rejects.toThrow('Invalid API key');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('rethrows the last error once attempts run out', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransientError('LLM: connection failure'));

    await expect(withRetry(fn, { sleep, maxAttempts: 2 })).rejects.toBeInstanceOf(TransientError);

    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelay', () => {
  it('doubles from 2s and caps at 10s', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt))).toEqual([2000, 4000, 8000, 10000, 10000]);
  });

  it('never goes below the minimum', () => {
    expect(backoffDelay(1, 500, 1000, 10000)).toBe(1000);
    expect(backoffDelay(2, 500, 1000, 10000)).toBe(1000);
    expect(backoffDelay(3, 500, 1000, 10000)).toBe(2000);
  });
});

describe('isTransientFailure', () => {
  it('matches on the error message, case-insensitively', () => {
    expect(isTransientFailure(new Error('Connection refused'))).toBe(true);
    expect(isTransientFailure(new Error('gateway TIMEOUT'))).toBe(true);
    expect(isTransientFailure('socket timeout')).toBe(true);
    expect(isTransientFailure(new Error('Unexpected token in JSON'))).toBe(false);
  });
});
