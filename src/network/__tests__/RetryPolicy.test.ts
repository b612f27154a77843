/**
 * Tests for callWithRetry
 */

import { describe, it, expect, vi } from 'vitest';
import { callWithRetry, computeBackoffDelay, retryOptionsFromConfig, type RetryOptions } from '../RetryPolicy.js';
import { RateLimiter } from '../RateLimiter.js';
import { classifyHttpStatus } from '../NetworkError.js';
import {
  NetworkPermanent,
  NetworkTransient,
  OperationCancelled,
  RetriesExhausted,
} from '../../errors/AgentError.js';
import { ActivityStream } from '../../services/ActivityStream.js';
import { ActivityEventType } from '../../types/index.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';

function baseOptions<T = unknown>(overrides: Partial<RetryOptions<T>> = {}): RetryOptions<T> {
  return {
    maxRetries: 3,
    baseDelayMs: 100,
    maxDelayMs: 10_000,
    sleep: vi.fn(async () => {}),
    random: () => 0,
    ...overrides,
  };
}

const transient = () => new NetworkTransient('connection reset', 'connection');

describe('computeBackoffDelay', () => {
  it('doubles from the base delay and adds jitter', () => {
    expect(computeBackoffDelay(1, 1000, 30_000, () => 0)).toBe(1000);
    expect(computeBackoffDelay(2, 1000, 30_000, () => 0)).toBe(2000);
    expect(computeBackoffDelay(3, 1000, 30_000, () => 0.5)).toBe(4500);
  });

  it('caps the exponential part at the maximum delay', () => {
    expect(computeBackoffDelay(10, 1000, 30_000, () => 0)).toBe(30_000);
  });

  it('keeps jitter below one second', () => {
    expect(computeBackoffDelay(1, 0, 0, () => 0.9999)).toBe(999);
  });
});

describe('callWithRetry', () => {
  it('succeeds after transient failures within the budget', async () => {
    const operation = vi
      .fn<[AbortSignal, number], Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('ok');
    const sleep = vi.fn(async () => {});
    const options = baseOptions({ sleep });

    await expect(callWithRetry(operation, options)).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(4);
    expect(operation.mock.calls.map(call => call[1])).toEqual([1, 2, 3, 4]);
    expect(sleep.mock.calls).toEqual([
      [100, undefined],
      [200, undefined],
      [400, undefined],
    ]);
  });

  it('gives up with RetriesExhausted after maxRetries retries', async () => {
    const operation = vi.fn(async () => {
      throw transient();
    });
    const options = baseOptions({ maxRetries: 2 });

    const error = await callWithRetry(operation, options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhausted);
    if (error instanceof RetriesExhausted) {
      expect(error.attempts).toBe(3);
      expect(error.lastError.message).toBe('connection reset');
      expect(error.message).toBe('Gave up after 3 attempts: connection reset');
    }
    expect(operation).toHaveBeenCalledTimes(3);
    expect(options.sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry permanent failures', async () => {
    const operation = vi.fn(async () => {
      throw classifyHttpStatus(401, 'model request failed: HTTP 401');
    });
    const options = baseOptions();

    await expect(callWithRetry(operation, options)).rejects.toBeInstanceOf(NetworkPermanent);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(options.sleep).not.toHaveBeenCalled();
  });

  it('classifies raw errors before deciding', async () => {
    const operation = vi
      .fn<[AbortSignal, number], Promise<string>>()
      .mockRejectedValueOnce(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))
      .mockResolvedValueOnce('ok');

    await expect(callWithRetry(operation, baseOptions())).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('waits at least Retry-After on 429 and penalizes the limiter', async () => {
    let clock = 0;
    const advance = async (ms: number) => {
      clock += ms;
    };
    const limiter = new RateLimiter({
      maxRequestsPerMinute: 10,
      maxTokensPerMinute: 100_000,
      now: () => clock,
      sleep: advance,
    });
    const penalize = vi.spyOn(limiter, 'penalize');
    const sleep = vi.fn(advance);

    const operation = vi
      .fn<[AbortSignal, number], Promise<string>>()
      .mockRejectedValueOnce(classifyHttpStatus(429, 'HTTP 429', 3000))
      .mockResolvedValueOnce('ok');

    await expect(callWithRetry(operation, baseOptions({ rateLimiter: limiter, sleep }))).resolves.toBe('ok');

    expect(penalize).toHaveBeenCalledWith(3000);
    expect(sleep.mock.calls).toEqual([[3000, undefined]]);
    expect(limiter.getUsage().requests).toBe(2);
  });

  it('charges failed attempts no tokens and settles the successful one', async () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 10, maxTokensPerMinute: 100_000, now: () => 0 });
    const operation = vi
      .fn<[AbortSignal, number], Promise<{ total: number }>>()
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce({ total: 42 });

    await callWithRetry(
      operation,
      baseOptions({ rateLimiter: limiter, estimatedTokens: 500, usageOf: (result: { total: number }) => result.total })
    );

    expect(limiter.getUsage()).toEqual({ requests: 2, tokens: 42 });
  });

  it('falls back to the default penalty when 429 has no Retry-After', async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi
      .fn<[AbortSignal, number], Promise<string>>()
      .mockRejectedValueOnce(classifyHttpStatus(429, 'HTTP 429'))
      .mockResolvedValueOnce('ok');

    await callWithRetry(operation, baseOptions({ sleep }));
    expect(sleep.mock.calls).toEqual([[5000, undefined]]);
  });

  it('records a NETWORK_RETRY event per retry', async () => {
    const activityStream = new ActivityStream();
    const events: Record<string, unknown>[] = [];
    activityStream.subscribe(ActivityEventType.NETWORK_RETRY, event => events.push(event.data));

    const operation = vi
      .fn<[AbortSignal, number], Promise<string>>()
      .mockRejectedValueOnce(classifyHttpStatus(503, 'HTTP 503'))
      .mockResolvedValueOnce('ok');

    await callWithRetry(operation, baseOptions({ activityStream, label: 'model request' }));

    expect(events).toEqual([
      {
        label: 'model request',
        attempt: 1,
        kind: 'server_error',
        status: 503,
        delay_ms: 100,
        error: 'HTTP 503',
      },
    ]);
  });

  it('turns a per-attempt timeout into a transient failure', async () => {
    const operation = (signal: AbortSignal) =>
      new Promise<string>((_, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason));
      });

    const error = await callWithRetry(
      operation,
      baseOptions({ maxRetries: 0, requestTimeoutMs: 20, label: 'model request' })
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhausted);
    if (error instanceof RetriesExhausted) {
      expect(error.attempts).toBe(1);
      expect(error.lastError.kind).toBe('timeout');
      expect(error.lastError.message).toBe('model request timed out after 20ms');
    }
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'ok');

    await expect(callWithRetry(operation, baseOptions({ signal: controller.signal }))).rejects.toBeInstanceOf(
      OperationCancelled
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('reports cancellation instead of the attempt error, keeping the reason', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      controller.abort(new OperationCancelled('turn_timeout'));
      throw new Error('socket closed');
    });

    const error = await callWithRetry(operation, baseOptions({ signal: controller.signal })).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(OperationCancelled);
    if (error instanceof OperationCancelled) {
      expect(error.reason).toBe('turn_timeout');
    }
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('retryOptionsFromConfig', () => {
  it('maps configuration keys', () => {
    expect(retryOptionsFromConfig(DEFAULT_CONFIG)).toEqual({
      maxRetries: DEFAULT_CONFIG.max_retries,
      baseDelayMs: DEFAULT_CONFIG.base_retry_delay_ms,
      maxDelayMs: DEFAULT_CONFIG.max_retry_delay_ms,
      requestTimeoutMs: DEFAULT_CONFIG.request_timeout_ms,
    });
  });
});
