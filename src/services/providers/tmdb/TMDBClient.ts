/**
 * TMDB API Client
 * Thin HTTP layer over the four endpoints the bot uses. Every request runs
 * through the retry strategy; failures surface as ApplicationErrors.
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import { logger } from '../../../middleware/logging.js';
import {
  AuthenticationError,
  ResourceNotFoundError,
  RateLimitError,
  ProviderServerError,
  NetworkError,
  ErrorCode,
  TMDB_RETRY_POLICY,
  RetryStrategy,
} from '../../../errors/index.js';
import {
  TMDBClientOptions,
  TMDBError,
  TMDBMovie,
  TMDBMovieDetailsOptions,
  TMDBMovieListResponse,
  TMDBMovieSearchResponse,
  TMDBSearchOptions,
} from '../../../types/providers/tmdb.js';

export const DEFAULT_TMDB_BASE_URL = 'https://api.themoviedb.org/3';

export class TMDBClient {
  private readonly client: AxiosInstance;
  private readonly retryStrategy: RetryStrategy;
  private readonly apiKey: string;

  constructor(options: TMDBClientOptions) {
    this.apiKey = options.apiKey;

    this.retryStrategy = new RetryStrategy({
      ...TMDB_RETRY_POLICY,
      maxAttempts: options.retry?.maxAttempts ?? TMDB_RETRY_POLICY.maxAttempts,
      delayMs: options.retry?.delayMs ?? TMDB_RETRY_POLICY.delayMs,
      onRetry: (error, attemptNumber, delayMs) => {
        logger.info('Retrying TMDB request', {
          error: error.message,
          attemptNumber,
          delayMs,
        });
      },
    });

    this.client = axios.create({
      baseURL: options.baseUrl || DEFAULT_TMDB_BASE_URL,
      timeout: options.timeoutMs ?? 10000,
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  // ============================================
  // Public API Methods
  // ============================================

  /**
   * Search for movies by title and optional release year
   */
  async searchMovies(options: TMDBSearchOptions): Promise<TMDBMovieSearchResponse> {
    const params: Record<string, string | number> = {
      query: options.query,
    };

    if (options.year) {
      params.year = options.year;
    }

    return this.request<TMDBMovieSearchResponse>('/search/movie', params);
  }

  /**
   * Get detailed movie information by TMDB ID
   */
  async getMovie(movieId: number, options: TMDBMovieDetailsOptions = {}): Promise<TMDBMovie> {
    const params: Record<string, string | number> = {};

    if (options.appendToResponse && options.appendToResponse.length > 0) {
      params.append_to_response = options.appendToResponse.join(',');
    }

    return this.request<TMDBMovie>(`/movie/${movieId}`, params);
  }

  /**
   * Movies trending this week
   */
  async getTrending(): Promise<TMDBMovieListResponse> {
    return this.request<TMDBMovieListResponse>('/trending/movie/week');
  }

  /**
   * Currently popular movies
   */
  async getPopular(): Promise<TMDBMovieListResponse> {
    return this.request<TMDBMovieListResponse>('/movie/popular');
  }

  // ============================================
  // Private Helper Methods
  // ============================================

  /**
   * GET with the API key as query parameter, wrapped in the retry strategy
   */
  private async request<T>(
    endpoint: string,
    params: Record<string, string | number> = {}
  ): Promise<T> {
    return this.retryStrategy.execute(async () => {
      try {
        const response = await this.client.get<T>(endpoint, {
          params: { api_key: this.apiKey, ...params },
        });

        logger.debug('TMDB API request successful', {
          endpoint,
          status: response.status,
        });

        return response.data;
      } catch (error) {
        throw this.convertToApplicationError(error, endpoint);
      }
    }, `TMDB ${endpoint}`);
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  private convertToApplicationError(error: unknown, endpoint: string): Error {
    const context = {
      service: 'TMDBClient',
      operation: 'request',
      metadata: { endpoint },
    };

    if (!isAxiosError<TMDBError>(error)) {
      return new NetworkError(
        `TMDB request failed: ${error instanceof Error ? error.message : String(error)}`,
        { url: endpoint, context, cause: error instanceof Error ? error : undefined }
      );
    }

    // Handle HTTP response errors
    if (error.response) {
      const status = error.response.status;
      const message = error.response.data?.status_message || error.message;

      switch (status) {
        case 401:
          return new AuthenticationError(
            `TMDB authentication failed: ${message}`,
            { ...context, metadata: { ...context.metadata, status } },
            error
          );

        case 404:
          return new ResourceNotFoundError(
            'TMDB resource',
            endpoint,
            { ...context, metadata: { ...context.metadata, status, message } }
          );

        case 429: {
          const retryAfter = Number(error.response.headers['retry-after']);
          return new RateLimitError(
            Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : 60,
            `Rate limit exceeded: ${message}`,
            { ...context, metadata: { ...context.metadata, status } }
          );
        }

        default:
          return new ProviderServerError(
            status,
            `API error (${status}): ${message}`,
            { ...context, metadata: { ...context.metadata, status } },
            error
          );
      }
    }

    // Network errors (timeout, connection refused, etc.)
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(`TMDB request timeout: ${endpoint}`, {
        code: ErrorCode.NETWORK_TIMEOUT,
        url: endpoint,
        context: { ...context, metadata: { ...context.metadata, code: error.code } },
        cause: error,
      });
    }

    return new NetworkError(`TMDB network error: ${error.message}`, {
      url: endpoint,
      context: { ...context, metadata: { ...context.metadata, code: error.code } },
      cause: error,
    });
  }
}
