export interface RetryOptions {
  attempts: number;
  baseDelayMillis: number;
  /** Waits between attempts; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called after a failed attempt that will be retried */
  onRetry?: (attempt: number, error: unknown, delayMillis: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Exponential backoff: base * 2^attempt, attempt counted from 0.
 */
export const calculateBackoff = (attempt: number, baseDelayMillis: number): number =>
  baseDelayMillis * 2 ** attempt;

/**
 * Runs `task` until it succeeds or `attempts` run out.
 * @throws The last attempt's error
 */
export async function withRetry<T>(task: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < options.attempts; attempt++) {
    try {
      return await task();
    } catch (error) {
      lastError = error;
      if (attempt + 1 >= options.attempts) break;

      const delay = calculateBackoff(attempt, options.baseDelayMillis);
      options.onRetry?.(attempt + 1, error, delay);
      await wait(delay);
    }
  }

  throw lastError;
}
