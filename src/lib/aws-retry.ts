/**
 * AWS API Retry Utility
 *
 * Provides retry logic with exponential backoff for AWS SDK read operations.
 * Handles transient failures like rate limiting, network errors, and temporary AWS issues.
 */

/**
 * AWS SDK error types that should be retried
 */
const RETRYABLE_ERROR_CODES = [
  'RequestTimeout',
  'RequestTimeoutException',
  'PriorRequestNotComplete',
  'ConnectionError',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'NetworkingError',
  'TimeoutError',
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
  'TooManyRequestsException',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalFailure',
  'InternalError',
  'InternalServiceError',
];

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  maxDelay?: number;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Replaces the timer-based sleep (tests) */
  sleep?: (ms: number) => Promise<void>;
}

function readHttpStatus(error: object): number | undefined {
  if (!('$metadata' in error)) return undefined;
  const metadata = error.$metadata;
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

/**
 * Check if an error should be retried
 */
export function isRetryableError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  if ('name' in error && typeof error.name === 'string' && RETRYABLE_ERROR_CODES.includes(error.name)) {
    return true;
  }

  if ('code' in error && typeof error.code === 'string' && RETRYABLE_ERROR_CODES.includes(error.code)) {
    return true;
  }

  // Check error message for common retry patterns
  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  if (
    message.includes('timeout') ||
    message.includes('ECONNRESET') ||
    message.includes('ETIMEDOUT') ||
    message.includes('rate limit') ||
    message.includes('throttl') ||
    message.includes('Too Many Requests')
  ) {
    return true;
  }

  // Retry on 429 (Too Many Requests), 500, 502, 503, 504
  const statusCode = readHttpStatus(error);
  return statusCode !== undefined && (statusCode === 429 || statusCode >= 500);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate backoff delay with jitter
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param baseDelay - Base delay in milliseconds (default: 1000ms)
 * @param maxDelay - Maximum delay in milliseconds (default: 30000ms)
 * @param jitter - Whether to add ±25% random variation
 * @returns Delay in milliseconds
 */
export function calculateBackoff(attempt: number, baseDelay = 1000, maxDelay = 30000, jitter = true): number {
  const cappedDelay = Math.min(baseDelay * Math.pow(2, attempt), maxDelay);

  if (!jitter) {
    return cappedDelay;
  }

  // ±25% so parallel callers do not retry in lockstep
  const variation = cappedDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.floor(cappedDelay + variation);
}

/**
 * Retry an async operation with exponential backoff
 *
 * Only transient errors are retried; anything else is thrown on first failure.
 *
 * @param operation - Async function to retry
 * @param options - Retry configuration
 * @returns Result of successful operation
 * @throws Last error if all retries exhausted
 *
 * @example
 * ```typescript
 * const status = await retryWithBackoff(
 *   () => api.getDistribution({ Id: distributionId }),
 *   { maxAttempts: 3, baseDelay: 1000 }
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry,
  } = options;
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxAttempts - 1 || !isRetryableError(error)) {
        throw error;
      }

      const delay = calculateBackoff(attempt, baseDelay, maxDelay);
      onRetry?.(error, attempt + 1, delay);
      await wait(delay);
    }
  }
}
