/**
 * Async helpers shared by adapters and apps: abortable sleep, bounded waits
 * and retry with linear backoff.
 */

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class AbortedError extends Error {
  constructor(message = "operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

/**
 * Resolves after `ms`, or early (without throwing) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted === true || ms <= 0) return Promise.resolve();

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Rejects with `TimeoutError` when `promise` does not settle within `timeoutMs`.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label = "operation"): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export interface RetryOptions {
  /** Retries after the first attempt (0 = single attempt) */
  retries: number;
  /** Delay before retry n is `delayMs * n` */
  delayMs: number;
  /** Only errors this returns true for are retried */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
  /** Once aborted no further attempt starts */
  signal?: AbortSignal;
}

/**
 * Runs `fn` until it resolves or the retry budget is spent; rethrows the last error.
 * Rejects with `AbortedError` when `signal` aborts before an attempt, including
 * during the wait between attempts.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    if (options.signal?.aborted === true) throw new AbortedError();
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= options.retries) break;

      options.onRetry?.(attempt + 1, error);
      await sleep(options.delayMs * (attempt + 1), options.signal);
    }
  }

  throw lastError;
}
