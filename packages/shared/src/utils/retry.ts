export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier?: number;
  /** Return false to give up on an error without further attempts. */
  shouldRetry?: (err: Error, attempt: number) => boolean;
  onRetry?: (err: Error, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error("retry: no attempts made");
  let delay = opts.baseDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      lastError = e instanceof Error ? e : new Error(String(e));
      if (attempt === opts.maxAttempts) break;
      if (opts.shouldRetry && !opts.shouldRetry(lastError, attempt)) break;
      opts.onRetry?.(lastError, attempt, delay);
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      delay = Math.min(delay * (opts.backoffMultiplier ?? 2), opts.maxDelayMs);
    }
  }

  throw lastError;
}
