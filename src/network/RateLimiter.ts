/**
 * RateLimiter - Sliding-window request and token ceilings
 *
 * The window holds one entry per admitted request. `tryReserve` is
 * synchronous: checking the window and recording the reservation happen in
 * one step that no other caller can interleave with. Waiting callers are
 * queued on a promise chain so they are admitted in arrival order.
 */

import { ActivityEventType, type Config, type RateLimitScope } from '../types/index.js';
import { RATE_LIMIT } from '../config/constants.js';
import type { ActivityStream } from '../services/ActivityStream.js';
import { logger } from '../services/Logger.js';
import { sleep as defaultSleep, throwIfCancelled, type SleepFn } from '../utils/sleep.js';

interface RateWindowEntry {
  timestamp: number;
  requests: number;
  tokens: number;
}

export interface RateLimiterOptions {
  maxRequestsPerMinute: number;
  maxTokensPerMinute: number;
  windowMs?: number;
  now?: () => number;
  sleep?: SleepFn;
}

export interface AcquireOptions {
  signal?: AbortSignal;
  /** Receives RATE_LIMITED events for this caller's waits */
  activityStream?: ActivityStream;
}

export type ReserveResult = { waitMs: 0; reservation: RateReservation } | { waitMs: number; reservation?: undefined };

export interface RateUsage {
  requests: number;
  tokens: number;
}

/**
 * One admitted request's place in the window. Settling it corrects that
 * request's token count, never another caller's.
 */
export class RateReservation {
  constructor(private readonly entry: RateWindowEntry) {}

  get tokens(): number {
    return this.entry.tokens;
  }

  /**
   * Replace the estimate with the count the server reported
   */
  settle(actualTokens: number): void {
    this.entry.tokens = Math.max(0, actualTokens);
  }

  /**
   * The request failed: it still counts as a request but used no tokens
   */
  release(): void {
    this.entry.tokens = 0;
  }
}

export class RateLimiter {
  private readonly maxRequests: number;
  private readonly maxTokens: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  private entries: RateWindowEntry[] = [];
  private penaltyUntil = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.maxRequests = options.maxRequestsPerMinute;
    this.maxTokens = options.maxTokensPerMinute;
    this.windowMs = options.windowMs ?? RATE_LIMIT.WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait until a request of `estimatedTokens` fits in the window, then
   * record it. Rejects with OperationCancelled if the signal fires first.
   */
  acquire(estimatedTokens: number, options: AcquireOptions = {}): Promise<RateReservation> {
    const turn = this.queue.then(() => this.waitForSlot(estimatedTokens, options));
    // A cancelled waiter must not stall the ones behind it
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async waitForSlot(estimatedTokens: number, options: AcquireOptions): Promise<RateReservation> {
    for (;;) {
      throwIfCancelled(options.signal);
      const result = this.tryReserve(estimatedTokens);
      if (result.reservation) {
        return result.reservation;
      }

      logger.debug(`[RATE_LIMITER] Window full, waiting ${result.waitMs}ms`);
      options.activityStream?.record(ActivityEventType.RATE_LIMITED, {
        wait_ms: result.waitMs,
        ...this.getUsage(),
      });
      await this.sleep(result.waitMs, options.signal);
    }
  }

  /**
   * Admit and record the request if it fits; otherwise say how long to wait
   * before checking again
   */
  tryReserve(estimatedTokens: number): ReserveResult {
    const now = this.now();
    this.prune(now);

    if (now < this.penaltyUntil) {
      return { waitMs: this.penaltyUntil - now };
    }

    const usage = this.getUsage();
    const overRequests = usage.requests + 1 > this.maxRequests;
    // A single request larger than the token ceiling is admitted into an empty window
    const overTokens = this.entries.length > 0 && usage.tokens + estimatedTokens > this.maxTokens;

    if (overRequests || overTokens) {
      const oldest = this.entries[0];
      const expiresIn = oldest ? oldest.timestamp + this.windowMs - now : this.windowMs;
      return { waitMs: Math.max(1, expiresIn) };
    }

    const entry: RateWindowEntry = { timestamp: now, requests: 1, tokens: Math.max(0, estimatedTokens) };
    this.entries.push(entry);
    return { waitMs: 0, reservation: new RateReservation(entry) };
  }

  /**
   * Hold all acquisitions until `retryAfterMs` from now (after a 429)
   */
  penalize(retryAfterMs: number): void {
    const until = this.now() + Math.max(0, retryAfterMs);
    if (until > this.penaltyUntil) {
      this.penaltyUntil = until;
      logger.debug(`[RATE_LIMITER] Penalized for ${retryAfterMs}ms`);
    }
  }

  getUsage(): RateUsage {
    let requests = 0;
    let tokens = 0;
    for (const entry of this.entries) {
      requests += entry.requests;
      tokens += entry.tokens;
    }
    return { requests, tokens };
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.entries.length > 0 && (this.entries[0]?.timestamp ?? now) <= cutoff) {
      this.entries.shift();
    }
  }
}

let processLimiter: RateLimiter | null = null;

/**
 * Build the limiter for one session. With scope 'process' every session in
 * this process shares a single window; events go to whichever stream each
 * caller passes to `acquire`.
 */
export function createRateLimiter(
  config: Pick<Config, 'max_requests_per_minute' | 'max_tokens_per_minute' | 'rate_limit_scope'>
): RateLimiter {
  const options: RateLimiterOptions = {
    maxRequestsPerMinute: config.max_requests_per_minute,
    maxTokensPerMinute: config.max_tokens_per_minute,
  };
  const scope: RateLimitScope = config.rate_limit_scope;

  if (scope === 'session') {
    return new RateLimiter(options);
  }
  if (!processLimiter) {
    processLimiter = new RateLimiter(options);
  }
  return processLimiter;
}

/**
 * Drop the shared limiter (tests)
 */
export function resetProcessRateLimiter(): void {
  processLimiter = null;
}
