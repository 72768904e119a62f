import { describe, it, expect, vi } from 'vitest';
import { withRetry, backoffDelay, resolvePolicy, DEFAULT_RETRY_POLICY } from '../src/lib/retry';
import { ProviderError } from '../src/lib/errors';

describe('backoffDelay', () => {
  it('doubles from the base delay and stops at the cap', () => {
    expect(backoffDelay(1, DEFAULT_RETRY_POLICY)).toBe(1000);
    expect(backoffDelay(2, DEFAULT_RETRY_POLICY)).toBe(2000);
    expect(backoffDelay(3, DEFAULT_RETRY_POLICY)).toBe(4000);
    expect(backoffDelay(6, DEFAULT_RETRY_POLICY)).toBe(32000);
    expect(backoffDelay(7, DEFAULT_RETRY_POLICY)).toBe(60000);
  });
});

describe('resolvePolicy', () => {
  it('fills in defaults', () => {
    expect(resolvePolicy({ maxAttempts: 2 })).toEqual({ maxAttempts: 2, baseDelayMs: 1000, maxDelayMs: 60000 });
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => resolvePolicy({ maxAttempts: 0 })).toThrow(RangeError);
  });
});

describe('withRetry', () => {
  it('retries transient failures and returns the eventual result', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ProviderError('rate_limited', 'mock', 'slow down'))
      .mockRejectedValueOnce(new ProviderError('timeout', 'mock', 'too slow'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map(call => call[0])).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('does not retry non-transient failures', async () => {
    const sleep = vi.fn(async () => {});
    const error = new ProviderError('unauthorized', 'mock', 'bad key');
    const fn = vi.fn(async () => {
      throw error;
    });

    await expect(withRetry(fn, { sleep })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('rethrows the last error when attempts run out', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi.fn(async (attempt: number) => {
      throw new ProviderError('unavailable', 'mock', `down on attempt ${attempt}`);
    });

    await expect(withRetry(fn, { sleep, policy: { maxAttempts: 3 } })).rejects.toThrow('mock: down on attempt 3');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('uses a custom retry predicate', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce(7);

    await expect(withRetry(fn, { sleep, isRetryable: () => true, policy: { baseDelayMs: 5 } })).resolves.toBe(7);
    expect(sleep.mock.calls).toEqual([[5]]);
  });
});
