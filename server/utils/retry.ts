export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs `task` up to `attempts` times with exponential back-off (base, 2x base, 4x base...).
 * The last error is rethrown once attempts are exhausted or `shouldRetry` declines.
 */
export async function withRetry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      lastError = error;
      const retryable = options.shouldRetry ? options.shouldRetry(error, attempt) : true;
      if (attempt >= attempts || !retryable) {
        break;
      }
      const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs ?? 60000);
      options.onRetry?.(error, attempt, delay);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
