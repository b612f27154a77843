/**
 * RetryPolicy - Bounded retries with exponential backoff and jitter
 *
 * Attempts run strictly one after another. Each attempt gets its own
 * AbortSignal that fires on the caller's cancellation or on the per-attempt
 * timeout, whichever comes first.
 */

import { ActivityEventType, type Config } from '../types/index.js';
import {
  NetworkError,
  NetworkTransient,
  OperationCancelled,
  RetriesExhausted,
} from '../errors/AgentError.js';
import { RATE_LIMIT, RETRY_CONFIG } from '../config/constants.js';
import type { ActivityStream } from '../services/ActivityStream.js';
import { logger } from '../services/Logger.js';
import { cancellationFrom, sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';
import { createTimeoutSignal } from '../utils/abort.js';
import { classifyNetworkError } from './NetworkError.js';
import type { RateLimiter } from './RateLimiter.js';

export interface RetryOptions<T = unknown> {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout; 0 or undefined disables it */
  requestTimeoutMs?: number;
  rateLimiter?: RateLimiter;
  estimatedTokens?: number;
  /** Token count the server reported for a successful result, if any */
  usageOf?: (result: T) => number | undefined;
  signal?: AbortSignal;
  activityStream?: ActivityStream;
  /** Shown in logs and events */
  label?: string;
  sleep?: SleepFn;
  random?: () => number;
}

export function retryOptionsFromConfig(
  config: Pick<Config, 'max_retries' | 'base_retry_delay_ms' | 'max_retry_delay_ms' | 'request_timeout_ms'>
): Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'requestTimeoutMs'> {
  return {
    maxRetries: config.max_retries,
    baseDelayMs: config.base_retry_delay_ms,
    maxDelayMs: config.max_retry_delay_ms,
    requestTimeoutMs: config.request_timeout_ms,
  };
}

/**
 * delay = min(maxDelay, base * 2^(attempt-1)) + uniform[0, 1000ms)
 *
 * @param attempt - 1-indexed number of the attempt that just failed
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)));
  const jitter = Math.floor(random() * RETRY_CONFIG.MAX_JITTER_MS);
  return exponential + Math.min(jitter, RETRY_CONFIG.MAX_JITTER_MS - 1);
}

/**
 * Run `operation` until it succeeds, fails permanently, or the retry budget
 * is spent
 *
 * @throws NetworkPermanent on a non-retryable failure
 * @throws RetriesExhausted after more than `maxRetries` retries
 * @throws OperationCancelled when the caller's signal fires
 */
export async function callWithRetry<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? 'request';

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw cancellationFrom(options.signal);
    }

    const reservation = await options.rateLimiter?.acquire(options.estimatedTokens ?? 0, {
      signal: options.signal,
      activityStream: options.activityStream,
    });

    const attemptSignal = createTimeoutSignal(options.signal, options.requestTimeoutMs);
    let failure: NetworkError;
    try {
      const result = await operation(attemptSignal.signal, attempt);
      const usedTokens = options.usageOf?.(result);
      if (usedTokens !== undefined) {
        reservation?.settle(usedTokens);
      }
      return result;
    } catch (error) {
      reservation?.release();
      if (options.signal?.aborted) {
        throw cancellationFrom(options.signal);
      }
      if (error instanceof OperationCancelled) {
        throw error;
      }
      failure = attemptSignal.timedOut()
        ? new NetworkTransient(
            `${label} timed out after ${options.requestTimeoutMs ?? 0}ms`,
            'timeout',
            undefined,
            undefined,
            { cause: error }
          )
        : classifyNetworkError(error);
    } finally {
      attemptSignal.dispose();
    }

    if (!(failure instanceof NetworkTransient)) {
      logger.debug(`[NETWORK] ${label} failed permanently on attempt ${attempt}: ${failure.message}`);
      throw failure;
    }

    let delayMs = computeBackoffDelay(attempt, options.baseDelayMs, options.maxDelayMs, options.random);

    if (failure.kind === 'rate_limited') {
      const penalty = failure.retryAfterMs ?? RATE_LIMIT.DEFAULT_429_PENALTY_MS;
      options.rateLimiter?.penalize(penalty);
      delayMs = Math.max(delayMs, penalty);
    }

    if (attempt > options.maxRetries) {
      logger.warn(`[NETWORK] ${label} failed after ${attempt} attempts: ${failure.message}`);
      throw new RetriesExhausted(attempt, failure);
    }

    logger.verbose(
      `[NETWORK] ${label} attempt ${attempt} failed (${failure.kind}): ${failure.message}. Retrying in ${delayMs}ms`
    );
    options.activityStream?.record(ActivityEventType.NETWORK_RETRY, {
      label,
      attempt,
      kind: failure.kind,
      status: failure.status,
      delay_ms: delayMs,
      error: failure.message,
    });

    await sleep(delayMs, options.signal);
  }
}
