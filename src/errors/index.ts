/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
  ResourceNotFoundError,
  AuthenticationError,
  AuthorizationError,
  DatabaseError,
  DuplicateKeyError,
  NetworkError,
  RateLimitError,
  ProviderServerError,
  ConfigurationError,
} from './ApplicationError.js';

export { RetryStrategy, TMDB_RETRY_POLICY } from './RetryStrategy.js';

export type { RetryPolicy, RetryResult } from './RetryStrategy.js';
