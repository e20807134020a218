/**
 * Error types shared by the bot handlers, the TMDB client, the store and the
 * webhook server.
 *
 * Each error carries a machine-readable code, the HTTP status the webhook
 * server answers with, and a retry hint read by RetryStrategy.
 */

export enum ErrorCode {
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  AUTH_AUTHENTICATION_FAILED = 'AUTH_AUTHENTICATION_FAILED',
  AUTH_ADMIN_REQUIRED = 'AUTH_ADMIN_REQUIRED',

  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',

  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',

  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Structured fields logged alongside an error
 */
export interface ErrorContext {
  /** Component that raised the error, e.g. 'TMDBClient' */
  service?: string;
  operation?: string;
  userId?: number;
  movieId?: number;
  metadata?: Record<string, unknown>;
}

interface ErrorDetails {
  statusCode: number;
  /** False for misconfiguration and bugs; the webhook server hides their message */
  operational?: boolean;
  retryable?: boolean;
  context?: ErrorContext | undefined;
  cause?: Error | undefined;
}

export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  protected constructor(message: string, code: ErrorCode, details: ErrorDetails) {
    super(message);

    this.name = new.target.name;
    this.code = code;
    this.statusCode = details.statusCode;
    this.isOperational = details.operational ?? true;
    this.retryable = details.retryable ?? false;
    this.context = details.context ?? {};
    if (details.cause) {
      this.cause = details.cause;
    }
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }
}

/**
 * TMDB answered 404 for a path
 */
export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resource: string,
    public readonly resourceId: string | number,
    context?: ErrorContext
  ) {
    super(`${resource} not found: ${resourceId}`, ErrorCode.RESOURCE_NOT_FOUND, {
      statusCode: 404,
      context,
    });
  }
}

export class AuthenticationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.AUTH_AUTHENTICATION_FAILED, { statusCode: 401, context, cause });
  }
}

/**
 * A user outside the admin set invoked an admin-only command
 */
export class AuthorizationError extends ApplicationError {
  constructor(
    public readonly command: string,
    public readonly userId: number
  ) {
    super(`User ${userId} is not an admin and cannot run /${command}`, ErrorCode.AUTH_ADMIN_REQUIRED, {
      statusCode: 403,
      context: { operation: command, userId },
    });
  }
}

interface StorageErrorOptions {
  code?: ErrorCode;
  retryable?: boolean;
  context?: ErrorContext;
  cause?: Error | undefined;
}

export class DatabaseError extends ApplicationError {
  constructor(message: string, options: StorageErrorOptions = {}) {
    super(message, options.code ?? ErrorCode.DATABASE_QUERY_FAILED, {
      statusCode: 500,
      retryable: options.retryable ?? false,
      context: options.context,
      cause: options.cause,
    });
  }
}

/**
 * UNIQUE or PRIMARY KEY constraint violation, e.g. saving the same favorite twice
 */
export class DuplicateKeyError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly column: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(`Duplicate key in ${table}.${column}`, {
      code: ErrorCode.DATABASE_DUPLICATE_KEY,
      context: { ...context, metadata: { ...context?.metadata, table, column } },
      cause,
    });
  }
}

interface NetworkErrorOptions {
  code?: ErrorCode.NETWORK_CONNECTION_FAILED | ErrorCode.NETWORK_TIMEOUT;
  url?: string;
  context?: ErrorContext;
  cause?: Error | undefined;
}

/**
 * Request never got an HTTP answer (timeout, refused or reset connection)
 */
export class NetworkError extends ApplicationError {
  public readonly url?: string;

  constructor(message: string, options: NetworkErrorOptions = {}) {
    super(message, options.code ?? ErrorCode.NETWORK_CONNECTION_FAILED, {
      statusCode: 503,
      retryable: true,
      context: { ...options.context, metadata: { ...options.context?.metadata, url: options.url } },
      cause: options.cause,
    });
    this.url = options.url;
  }
}

export class RateLimitError extends ApplicationError {
  constructor(
    public readonly retryAfterSeconds: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(message || `TMDB rate limit exceeded, retry after ${retryAfterSeconds}s`, ErrorCode.PROVIDER_RATE_LIMIT, {
      statusCode: 429,
      retryable: true,
      context,
    });
  }
}

/**
 * Any other non-2xx answer from TMDB; 5xx is retryable
 */
export class ProviderServerError extends ApplicationError {
  constructor(
    public readonly httpStatus: number,
    message: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, ErrorCode.PROVIDER_SERVER_ERROR, {
      statusCode: httpStatus,
      retryable: httpStatus >= 500,
      context,
      cause,
    });
  }
}

/**
 * Missing or malformed environment setting; raised at startup only
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    public readonly configKey: string,
    message?: string
  ) {
    super(message || `Configuration error: ${configKey}`, ErrorCode.CONFIG_INVALID, {
      statusCode: 500,
      operational: false,
      context: { metadata: { configKey } },
    });
  }
}
