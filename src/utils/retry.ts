import { RateLimitedError } from './github.errors';

export interface BackoffOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential delay for the given 1-based attempt with equal jitter, raised to
 * the source's retry-after hint when it gives one.
 */
export function backoffDelay(
  attempt: number,
  options: Pick<BackoffOptions, 'baseDelayMs' | 'maxDelayMs' | 'random'>,
  hintMs = 0,
): number {
  const exp = Math.min(options.maxDelayMs, options.baseDelayMs * Math.pow(2, attempt - 1));
  const random = options.random ?? Math.random;
  const jittered = Math.floor(exp / 2 + random() * (exp / 2));
  return Math.max(jittered, hintMs);
}

/**
 * Runs `fn` until it succeeds, `shouldRetry` rejects the error or attempts run
 * out. A retry-after hint longer than `maxDelayMs` fails immediately.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: BackoffOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) throw error;
      const hintMs = error instanceof RateLimitedError ? error.retryAfterSeconds * 1000 : 0;
      if (hintMs > options.maxDelayMs) throw error;
      const delay = backoffDelay(attempt, options, hintMs);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
