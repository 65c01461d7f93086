/**
 * Request pacing and retry policy for provider calls.
 *
 * The provider's rate limit is global, so one limiter instance is shared by
 * every request the engine issues. Limiters own their clock and sleep so
 * tests can drive them without real timers.
 */

import { ProviderError } from './errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal | null) => Promise<void>;
export type NowFn = () => number;

export interface RateLimiter {
  /** Resolves once the caller may issue one request. */
  acquire(signal?: AbortSignal | null): Promise<void>;
}

function buildAbortError(message: string): ProviderError {
  const err = new ProviderError(message, { httpStatus: 499, retryable: false });
  err.name = 'AbortError';
  return err;
}

export function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(buildAbortError('Aborted while waiting for a provider request slot')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export interface IntervalRateLimiterOptions {
  /** Minimum spacing between two consecutive acquisitions. */
  minIntervalMs: number;
  now?: NowFn;
  sleep?: SleepFn;
}

/**
 * Guarantees at least `minIntervalMs` between consecutive requests. The gap
 * is measured from the previous acquisition, so a caller that did other work
 * in between waits only for the remainder.
 */
export class IntervalRateLimiter implements RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: NowFn;
  private readonly sleep: SleepFn;
  private lastAcquiredMs: number | null = null;

  constructor(options: IntervalRateLimiterOptions) {
    this.minIntervalMs = Math.max(0, Math.floor(options.minIntervalMs));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleepWithAbort;
  }

  async acquire(signal?: AbortSignal | null): Promise<void> {
    if (signal?.aborted) {
      throw buildAbortError('Aborted while waiting for a provider request slot');
    }
    if (this.lastAcquiredMs !== null) {
      const waitMs = this.lastAcquiredMs + this.minIntervalMs - this.now();
      if (waitMs > 0) {
        await this.sleep(waitMs, signal);
      }
    }
    this.lastAcquiredMs = this.now();
  }
}

export interface TokenBucketRateLimiterOptions {
  maxRequestsPerSecond: number;
  /** Burst size; defaults to maxRequestsPerSecond. */
  capacity?: number;
  now?: NowFn;
  sleep?: SleepFn;
}

/** Token bucket refilled continuously at `maxRequestsPerSecond`. */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly ratePerSecond: number;
  private readonly capacity: number;
  private readonly now: NowFn;
  private readonly sleep: SleepFn;
  private tokens: number;
  private lastRefillMs: number;

  constructor(options: TokenBucketRateLimiterOptions) {
    this.ratePerSecond = Math.max(1, options.maxRequestsPerSecond);
    this.capacity = Math.max(1, options.capacity ?? this.ratePerSecond);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleepWithAbort;
    this.tokens = this.capacity;
    this.lastRefillMs = this.now();
  }

  async acquire(signal?: AbortSignal | null): Promise<void> {
    while (true) {
      if (signal?.aborted) {
        throw buildAbortError('Aborted while waiting for a provider request slot');
      }
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const missingTokens = 1 - this.tokens;
      const waitMs = Math.ceil((missingTokens * 1000) / this.ratePerSecond);
      await this.sleep(Math.max(1, waitMs), signal);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.lastRefillMs);
    if (elapsedMs <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs * this.ratePerSecond) / 1000);
    this.lastRefillMs = now;
  }
}

// ---------------------------------------------------------------------------
// Retry with exponential backoff
// ---------------------------------------------------------------------------

export interface BackoffPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => boolean;
}

export function backoffDelayMs(policy: Pick<BackoffPolicy, 'baseDelayMs' | 'maxDelayMs'>, attempt: number): number {
  const n = Math.max(1, Math.floor(attempt));
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (n - 1));
}

export interface RetryHooks {
  sleep?: SleepFn;
  signal?: AbortSignal | null;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export async function retryWithBackoff<T>(
  task: (attempt: number) => Promise<T>,
  policy: BackoffPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? sleepWithAbort;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (err: unknown) {
      if (attempt >= maxAttempts || !policy.shouldRetry(err) || hooks.signal?.aborted) {
        throw err;
      }
      const delayMs = backoffDelayMs(policy, attempt);
      hooks.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs, hooks.signal);
    }
  }
}
