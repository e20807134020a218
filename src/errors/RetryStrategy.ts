/**
 * Retry Strategy
 *
 * Re-runs an async operation with a fixed pause between attempts. The policy
 * or the ApplicationError retryable flag decides which failures get another
 * attempt.
 */

import { ApplicationError } from './ApplicationError.js';
import { logger } from '../middleware/logging.js';

// ============================================
// RETRY POLICY CONFIGURATION
// ============================================

export interface RetryPolicy {
  /**
   * Maximum number of attempts, including the first one
   */
  maxAttempts: number;

  /**
   * Fixed pause in milliseconds between two attempts
   */
  delayMs: number;

  /**
   * Decides whether a failure is worth another attempt.
   * Without it, the error's own retryable flag decides.
   */
  shouldRetry?: (error: Error, attemptNumber: number) => boolean;

  /**
   * Callback invoked before each retry attempt
   */
  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

// ============================================
// PREDEFINED RETRY POLICIES
// ============================================

/**
 * Policy for TMDB calls: three attempts, fixed five second pause, and every
 * failure raised by the HTTP layer (timeouts, refused connections, any
 * non-2xx status) counts as transient.
 */
export const TMDB_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 5000,
  shouldRetry: (error) => error instanceof ApplicationError && error.isOperational,
};

// ============================================
// RETRY STRATEGY CLASS
// ============================================

export class RetryStrategy {
  constructor(private readonly policy: RetryPolicy) {}

  /**
   * Execute an operation with retry logic.
   * Throws the last error once the attempts are exhausted.
   */
  async execute<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation'
  ): Promise<T> {
    const result = await this.executeWithResult(operation, operationName);
    if (result.success) {
      return result.value;
    }
    throw result.error;
  }

  /**
   * Execute an operation and return detailed result
   */
  async executeWithResult<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation'
  ): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, this.policy.maxAttempts);
    let attemptCount = 0;
    let totalDelayMs = 0;
    let lastError: Error = new Error(`${operationName} was never attempted`);

    while (attemptCount < maxAttempts) {
      attemptCount++;

      try {
        const value = await operation();
        return {
          success: true,
          value,
          attemptCount,
          totalDelayMs,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        logger.warn(`Attempt ${attemptCount}/${maxAttempts} failed for ${operationName}`, {
          error: lastError.message,
          attemptNumber: attemptCount,
        });

        if (!this.shouldRetryError(lastError, attemptCount)) {
          break;
        }

        if (attemptCount >= maxAttempts) {
          logger.error(`Max retries reached for ${operationName}`, {
            error: lastError.message,
            attemptCount,
            totalDelayMs,
          });
          break;
        }

        const delayMs = Math.max(0, this.policy.delayMs);
        totalDelayMs += delayMs;

        if (this.policy.onRetry) {
          this.policy.onRetry(lastError, attemptCount, delayMs);
        }

        await this.sleep(delayMs);
      }
    }

    return {
      success: false,
      error: lastError,
      attemptCount,
      totalDelayMs,
    };
  }

  /**
   * Determine if an error should be retried
   */
  private shouldRetryError(error: Error, attemptNumber: number): boolean {
    // Custom retry logic takes precedence
    if (this.policy.shouldRetry) {
      return this.policy.shouldRetry(error, attemptNumber);
    }

    if (error instanceof ApplicationError) {
      return error.retryable;
    }

    // For non-ApplicationErrors, default to not retrying
    return false;
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
