import { sleep as defaultSleep, type Sleep } from './sleep.js';

/**
 * Bounded exponential backoff, parameterized per call site.
 */
export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
}

/** Delay before retrying after the given 1-based attempt: base, 2x base, 4x base... up to the cap. */
export function backoffDelay(policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === attempts || options.signal?.aborted) break;

      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(attempt, err, delayMs);
      await wait(delayMs, options.signal);
      if (options.signal?.aborted) break;
    }
  }

  throw lastError;
}
