export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff (default: 500) */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Maximum random jitter to add in milliseconds (default: 200) */
  jitterMs: number;
  /** Callback invoked before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  isRetryable?: (error: Error) => boolean;
  /** Optional function to call before each attempt (e.g., an abort check) */
  beforeAttempt?: () => Promise<void>;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  jitterMs: 200,
};

/**
 * Determines if an error is retryable based on common patterns.
 *
 * Retryable errors:
 * - Network errors (ECONNRESET, ETIMEDOUT, ENOTFOUND, etc.)
 * - Timeout errors
 * - HTTP 429 (rate limit) and 5xx server errors
 * - Postgres serialization failures, deadlocks and dropped connections
 *
 * Non-retryable errors:
 * - Bad input (4xx except 429)
 * - Authentication / permission failures
 * - SQL syntax errors and missing relations
 */
export function isRetryableError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();

  const networkErrors = [
    'econnreset',
    'econnrefused',
    'etimedout',
    'enotfound',
    'enetunreach',
    'ehostunreach',
    'epipe',
    'socket hang up',
    'network error',
    'fetch failed',
    'connection terminated',
  ];

  for (const netError of networkErrors) {
    if (message.includes(netError)) {
      return true;
    }
  }

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    name.includes('timeout')
  ) {
    return true;
  }

  if (
    message.includes('could not serialize access') ||
    message.includes('deadlock detected')
  ) {
    return true;
  }

  if (
    message.includes('syntax error') ||
    message.includes('does not exist') ||
    message.includes('permission denied')
  ) {
    return false;
  }

  if (message.includes('429') || message.includes('rate limit')) {
    return true;
  }

  const serverErrorPattern = /\b5\d{2}\b/;
  if (serverErrorPattern.test(message)) {
    return true;
  }

  const clientErrorPattern = /\b4\d{2}\b/;
  if (clientErrorPattern.test(message)) {
    return false;
  }

  if (
    message.includes('unauthorized') ||
    message.includes('authentication failed') ||
    message.includes('invalid token')
  ) {
    return false;
  }

  // Default: assume retryable for unknown errors from external systems
  return true;
}

/**
 * Calculates the delay for a retry attempt using exponential backoff with jitter.
 *
 * Formula: min(maxDelay, baseDelay * 2^attempt) + random(0, jitter)
 */
export function calculateRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  // Jitter desynchronizes retries across concurrently running tables
  const jitter = Math.random() * jitterMs;

  return cappedDelay + jitter;
}

/**
 * Executes a function with retry logic, exponential backoff, and jitter.
 *
 * @example
 * const page = await withRetry(
 *   () => source.fetch(request),
 *   {
 *     maxRetries: 2,
 *     onRetry: (error, attempt) => log.warn('Retrying fetch', { attempt, error: error.message }),
 *     beforeAttempt: async () => signal.throwIfAborted(),
 *   }
 * );
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const isRetryable = opts.isRetryable ?? isRetryableError;
  let lastError: Error = new Error('withRetry made no attempts');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      if (opts.beforeAttempt) {
        await opts.beforeAttempt();
      }

      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < opts.maxRetries && isRetryable(lastError)) {
        const delay = calculateRetryDelay(
          attempt,
          opts.baseDelayMs,
          opts.maxDelayMs,
          opts.jitterMs
        );

        opts.onRetry?.(lastError, attempt + 1, delay);
        await sleep(delay);
      } else {
        throw lastError;
      }
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
