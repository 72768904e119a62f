/**
 * Explicit retry policy for remote calls
 */
import { isTransientProviderError, errorMessage } from './errors';
import { debug } from './utils/debug';
import { sleep as defaultSleep } from './utils/sleep';

/**
 * Exponential backoff parameters
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 6,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
};

/**
 * Options accepted by `withRetry` and by every component that calls a provider
 */
export interface RetryOptions {
  policy?: Partial<RetryPolicy>;
  /** Label used in debug output */
  label?: string;
  /** Decide whether a failure should be retried. Defaults to transient provider errors. */
  isRetryable?: (error: unknown) => boolean;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export function resolvePolicy(policy?: Partial<RetryPolicy>): RetryPolicy {
  const resolved = { ...DEFAULT_RETRY_POLICY, ...policy };
  if (!Number.isInteger(resolved.maxAttempts) || resolved.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${resolved.maxAttempts}`);
  }
  return resolved;
}

/**
 * Delay to wait after the given failed attempt (1-based)
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, exponential);
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy = resolvePolicy(options.policy);
  const isRetryable = options.isRetryable ?? isTransientProviderError;
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? 'call';

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!isRetryable(error) || attempt >= policy.maxAttempts) {
        debug('retry', '%s failed on attempt %d/%d, giving up: %s', label, attempt, policy.maxAttempts, errorMessage(error));
        throw error;
      }
      const delay = backoffDelay(attempt, policy);
      debug('retry', '%s failed on attempt %d/%d (%s), retrying in %dms', label, attempt, policy.maxAttempts, errorMessage(error), delay);
      await sleep(delay);
    }
  }
}
