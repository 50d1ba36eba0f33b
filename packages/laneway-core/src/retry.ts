/**
 * Bounded retry helpers
 *
 * `withRetry` backs off exponentially between attempts (base, 2x base, 4x base...).
 * `retrySync` is for synchronous work such as better-sqlite3 statements, where
 * sleeping is not an option and a retry is only useful for transient locks.
 */

export interface RetryOptions {
  /** Total attempts including the first one (default: 3) */
  attempts?: number;
  /** Delay before the second attempt in ms (default: 200) */
  baseDelayMs?: number;
  /** Upper bound for a single delay in ms (default: 10000) */
  maxDelayMs?: number;
  /** Return false to stop retrying on a given error */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injectable sleep (tests) */
  sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 200;
  const maxDelayMs = options.maxDelayMs ?? 10_000;
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= attempts || (options.shouldRetry && !options.shouldRetry(error, attempt))) {
        break;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  const message = lastError instanceof Error ? lastError.message : String(lastError);
  throw new RetryExhaustedError(message, attempts, lastError);
}

export function retrySync<T>(
  fn: (attempt: number) => T,
  attempts: number,
  onRetry?: (error: unknown, attempt: number) => void
): T {
  const total = Math.max(1, attempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= total; attempt++) {
    try {
      return fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt < total) {
        onRetry?.(error, attempt);
      }
    }
  }
  const message = lastError instanceof Error ? lastError.message : String(lastError);
  throw new RetryExhaustedError(message, total, lastError);
}
