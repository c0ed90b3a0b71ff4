export interface RetryPolicy {
  /** Additional attempts after the first one */
  count: number;
  backoff?: 'linear' | 'exponential';
  baseDelay?: number;
}

function calculateBackoff(attempt: number, backoff: 'linear' | 'exponential', baseDelay: number): number {
  if (backoff === 'exponential') {
    return baseDelay * 2 ** attempt;
  }
  return baseDelay * (attempt + 1);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Execute a function with retry logic. An aborted signal stops further attempts.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  retry?: RetryPolicy,
  onRetry?: (attempt: number, error: Error) => void,
  signal?: AbortSignal
): Promise<T> {
  const maxRetries = retry?.count ?? 0;
  const backoffType = retry?.backoff ?? 'linear';
  const baseDelay = retry?.baseDelay ?? 1000;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries || signal?.aborted) {
        break;
      }

      onRetry?.(attempt + 1, lastError);
      await sleep(calculateBackoff(attempt, backoffType, baseDelay), signal);
    }
  }

  throw lastError ?? new Error('Operation failed with no error details');
}
