export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  /** Once aborted, no further attempt starts and a pending backoff ends early. */
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown = options.signal?.reason;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    if (options.signal?.aborted) {
      break;
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt >= options.maxAttempts || (options.shouldRetry && !options.shouldRetry(error))) {
        break;
      }
      const waitMs = options.baseDelayMs * 2 ** (attempt - 1);
      options.onRetry?.(error, attempt, waitMs);
      await sleep(waitMs, options.signal);
    }
  }

  throw lastError;
}
