import { describe, it, expect, jest } from '@jest/globals';
import {
  RetryStrategy,
  TMDB_RETRY_POLICY,
  NetworkError,
  ResourceNotFoundError,
  ConfigurationError,
  AuthorizationError,
  ErrorCode,
} from '../../src/errors/index.js';

const noDelay = { delayMs: 0 };

describe('RetryStrategy', () => {
  it('returns the value of the first successful attempt', async () => {
    const strategy = new RetryStrategy({ ...TMDB_RETRY_POLICY, ...noDelay });
    const operation = jest.fn(async () => 'ok');

    await expect(strategy.execute(operation, 'test')).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures until an attempt succeeds', async () => {
    const strategy = new RetryStrategy({ ...TMDB_RETRY_POLICY, ...noDelay });
    let calls = 0;
    const operation = async (): Promise<string> => {
      calls++;
      if (calls < 3) {
        throw new NetworkError('connection reset');
      }
      return 'recovered';
    };

    const result = await strategy.executeWithResult(operation, 'test');

    expect(result).toEqual({ success: true, value: 'recovered', attemptCount: 3, totalDelayMs: 0 });
  });

  it('throws the last error after maxAttempts', async () => {
    const strategy = new RetryStrategy({ ...TMDB_RETRY_POLICY, ...noDelay });
    const operation = jest.fn(async (): Promise<string> => {
      throw new ResourceNotFoundError('TMDB resource', '/movie/1');
    });

    await expect(strategy.execute(operation, 'test')).rejects.toBeInstanceOf(ResourceNotFoundError);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('treats a 404 as transient under the TMDB policy', async () => {
    const strategy = new RetryStrategy({ ...TMDB_RETRY_POLICY, ...noDelay, maxAttempts: 2 });
    const operation = jest.fn(async (): Promise<string> => {
      throw new ResourceNotFoundError('TMDB resource', '/movie/1');
    });

    const result = await strategy.executeWithResult(operation, 'test');

    expect(result.success).toBe(false);
    expect(result.attemptCount).toBe(2);
  });

  it('does not retry programmer errors under the TMDB policy', async () => {
    const strategy = new RetryStrategy({ ...TMDB_RETRY_POLICY, ...noDelay });
    const operation = jest.fn(async (): Promise<string> => {
      throw new ConfigurationError('TMDB_API_KEY');
    });

    await expect(strategy.execute(operation, 'test')).rejects.toBeInstanceOf(ConfigurationError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('honours the retryable flag when no custom predicate is set', async () => {
    const strategy = new RetryStrategy({ maxAttempts: 3, delayMs: 0 });
    const operation = jest.fn(async (): Promise<string> => {
      throw new AuthorizationError('stats', 1001);
    });

    await expect(strategy.execute(operation, 'test')).rejects.toThrow(
      'User 1001 is not an admin and cannot run /stats'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries errors flagged retryable when no custom predicate is set', async () => {
    const strategy = new RetryStrategy({ maxAttempts: 2, delayMs: 0 });
    const operation = jest.fn(async (): Promise<string> => {
      throw new NetworkError('connection refused');
    });

    await expect(strategy.execute(operation, 'test')).rejects.toBeInstanceOf(NetworkError);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('reports each retry with a fixed delay', async () => {
    const onRetry = jest.fn();
    const strategy = new RetryStrategy({
      ...TMDB_RETRY_POLICY,
      delayMs: 1,
      onRetry,
    });

    const result = await strategy.executeWithResult(async (): Promise<string> => {
      throw new NetworkError('timeout', { code: ErrorCode.NETWORK_TIMEOUT });
    });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, expect.any(NetworkError), 1, 1);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.any(NetworkError), 2, 1);
    expect(result.totalDelayMs).toBe(2);
  });

  it('wraps non-Error rejections', async () => {
    const strategy = new RetryStrategy({ ...TMDB_RETRY_POLICY, ...noDelay });

    await expect(strategy.execute(() => Promise.reject('plain string'))).rejects.toThrow('plain string');
  });
});
