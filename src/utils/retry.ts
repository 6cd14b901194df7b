/**
 * Retry utility with linear backoff
 */

export interface RetryOptions {
  readonly maxAttempts?: number;
  /** Delay unit; the wait after attempt n is n * delayMs */
  readonly delayMs?: number;
  /** Errors for which this returns false are rethrown immediately */
  readonly isRetryable?: (error: unknown) => boolean;
  readonly onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  delayMs: 1000,
  isRetryable: () => true,
  onRetry: () => undefined
};

export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(
      `Operation failed after ${attempts} attempts: ` +
        (lastError instanceof Error ? lastError.message : String(lastError))
    );
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetryExhaustedError);
    }
  }
}

/**
 * Retries an async operation, waiting `attempt * delayMs` between attempts
 *
 * @param operation - The async operation to retry, given the attempt number
 * @param options - Retry configuration options
 * @returns The result of the operation
 * @throws {RetryExhaustedError} If every attempt fails
 * @throws The original error if it is not retryable
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!config.isRetryable(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < config.maxAttempts) {
        config.onRetry(error, attempt);
        await sleep(attempt * config.delayMs);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
