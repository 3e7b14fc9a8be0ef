/**
 * Backoff retries for collaborators that can be briefly unavailable at startup.
 * Domain operations never retry on their own.
 */

export interface RetryOptions {
  /** Attempts including the first (default: 3) */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Jitter source in [0, 1) */
  random?: () => number;
}

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5000,
};

/**
 * Delay before the attempt following `attempt`: doubling from the base, up to
 * 30% jitter on top, never above the maximum.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponential = baseDelayMs * 2 ** (attempt - 1);
  return Math.min(exponential + random() * 0.3 * exponential, maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;

  let attempt = 1;
  for (;;) {
    try {
      return await fn();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (attempt >= maxAttempts || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, options.random);
      options.onRetry?.(attempt, error, delayMs);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      attempt++;
    }
  }
}
