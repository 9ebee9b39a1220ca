import { ApiError, SchemaMismatchError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry');

export interface RetryPolicy {
  /** Total attempts, first call included */
  maxAttempts: number;
  /** Fixed wait between attempts */
  delayMs: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if error is authentication related
 */
export function isAuthError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return (
    message.includes('unauthorized') ||
    message.includes('forbidden') ||
    message.includes('invalid api key') ||
    message.includes('authentication')
  );
}

/**
 * Run an operation up to `maxAttempts` times with a fixed delay. Shape mismatches and
 * authentication failures are rethrown at once.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  provider: string
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (error instanceof SchemaMismatchError) {
        throw error;
      }
      if (isAuthError(error)) {
        throw new ApiError(`Authentication failed: ${errorMessage(error)}`, provider);
      }
      if (attempt === policy.maxAttempts) {
        break;
      }

      log.warn({ provider, attempt, maxAttempts: policy.maxAttempts, err: errorMessage(error) }, 'Request failed, retrying');
      await sleep(policy.delayMs);
    }
  }

  throw new ApiError(
    `Operation failed after ${policy.maxAttempts} attempts: ${errorMessage(lastError)}`,
    provider
  );
}

export abstract class BaseProvider {
  abstract readonly name: string;
  protected retryPolicy: RetryPolicy;

  constructor(retryPolicy: RetryPolicy) {
    this.retryPolicy = retryPolicy;
  }

  protected withRetry<T>(operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.retryPolicy, this.name);
  }
}
