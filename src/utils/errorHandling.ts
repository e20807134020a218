/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (error)` blocks, where the caught value is
 * `unknown`.
 */

import { ApplicationError } from '../errors/index.js';

/**
 * Type guard to check if value is an Error object
 */
function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof (error as { message: unknown }).message === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

/**
 * Create standardized error log context from unknown error
 * Returns structured object suitable for logger calls
 */
export function createErrorLogContext(
  error: unknown,
  additionalContext?: Record<string, unknown>
): Record<string, unknown> {
  const base: Record<string, unknown> = {
    error: getErrorMessage(error),
  };

  if (error instanceof ApplicationError) {
    base.code = error.code;
    base.errorContext = error.context;
  } else if (isError(error) && error.stack) {
    base.stack = error.stack;
  }

  return { ...base, ...additionalContext };
}
