import pRetry from 'p-retry';
import { AppError } from '../errors/types';
import { toAppError } from '../errors/handler';

export interface RetryOptions {
  maxRetries?: number;
  minTimeout?: number;
  maxTimeout?: number;
  onRetry?: (error: AppError, attempt: number) => void;
}

/**
 * Backoff profiles. `network` is for idempotent Steam API calls such as
 * QueryTime; `probe` for the cheap session-cookie fetch before a login.
 */
export const RETRY_PROFILES = {
  network: { maxRetries: 3, minTimeout: 1000, maxTimeout: 10000 },
  probe: { maxRetries: 2, minTimeout: 500, maxTimeout: 2000 },
} satisfies Record<string, RetryOptions>;

export type RetryProfile = keyof typeof RETRY_PROFILES;

/**
 * Retry with exponential backoff. Every failure is mapped to an AppError;
 * one that is not recoverable ends the retries at once.
 */
export async function retryOperation<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, minTimeout = 1000, maxTimeout = 10000, onRetry } = options;

  return pRetry(
    async (attempt) => {
      try {
        return await operation();
      } catch (error) {
        const appError = toAppError(error);
        if (!appError.isRecoverable) {
          throw new pRetry.AbortError(appError);
        }
        if (onRetry && attempt <= maxRetries) {
          onRetry(appError, attempt);
        }
        throw appError;
      }
    },
    { retries: maxRetries, minTimeout, maxTimeout }
  );
}

/**
 * Retry under one of the named profiles.
 */
export function withRetry<T>(
  profile: RetryProfile,
  operation: () => Promise<T>,
  onRetry?: (error: AppError, attempt: number) => void
): Promise<T> {
  return retryOperation(operation, { ...RETRY_PROFILES[profile], onRetry });
}
