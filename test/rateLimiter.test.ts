import test from 'node:test';
import assert from 'node:assert/strict';

import { ProviderError } from '../server/lib/errors.js';
import {
  backoffDelayMs,
  IntervalRateLimiter,
  retryWithBackoff,
  sleepWithAbort,
  TokenBucketRateLimiter,
  type BackoffPolicy,
} from '../server/lib/rateLimiter.js';

/** Manual clock whose sleep advances time instead of waiting. */
function manualClock() {
  const state = { now: 0, sleeps: [] as number[] };
  return {
    state,
    now: () => state.now,
    sleep: async (ms: number) => {
      state.sleeps.push(ms);
      state.now += ms;
    },
  };
}

test('IntervalRateLimiter spaces acquisitions by the minimum interval', async () => {
  const clock = manualClock();
  const limiter = new IntervalRateLimiter({ minIntervalMs: 2_000, now: clock.now, sleep: clock.sleep });

  await limiter.acquire();
  clock.state.now += 500;
  await limiter.acquire();
  clock.state.now += 3_000;
  await limiter.acquire();

  // Only the second call came early; it waited for the remainder.
  assert.deepEqual(clock.state.sleeps, [1_500]);
});

test('IntervalRateLimiter rejects an already aborted acquisition', async () => {
  const limiter = new IntervalRateLimiter({ minIntervalMs: 10 });
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(limiter.acquire(controller.signal), (err: unknown) => err instanceof ProviderError && err.name === 'AbortError');
});

test('TokenBucketRateLimiter allows a burst then waits for a refill', async () => {
  const clock = manualClock();
  const limiter = new TokenBucketRateLimiter({ maxRequestsPerSecond: 2, now: clock.now, sleep: clock.sleep });

  await limiter.acquire();
  await limiter.acquire();
  assert.deepEqual(clock.state.sleeps, []);

  await limiter.acquire();
  assert.deepEqual(clock.state.sleeps, [500]);
});

test('sleepWithAbort rejects as soon as the signal is aborted', async () => {
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(sleepWithAbort(60_000, controller.signal), (err: unknown) => err instanceof ProviderError && err.httpStatus === 499);
});

// ---------------------------------------------------------------------------
// Backoff
// ---------------------------------------------------------------------------

const policy: BackoffPolicy = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 250,
  shouldRetry: (err) => err instanceof ProviderError && err.retryable,
};

test('backoffDelayMs doubles per attempt up to the cap', () => {
  assert.deepEqual(
    [1, 2, 3, 4].map((attempt) => backoffDelayMs(policy, attempt)),
    [100, 200, 250, 250],
  );
});

test('retryWithBackoff retries retryable failures and returns the eventual result', async () => {
  const sleeps: number[] = [];
  const attempts: number[] = [];

  const result = await retryWithBackoff(
    async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) throw new ProviderError('busy', { httpStatus: 429 });
      return 'ok';
    },
    policy,
    { sleep: async (ms) => void sleeps.push(ms) },
  );

  assert.equal(result, 'ok');
  assert.deepEqual(attempts, [1, 2, 3]);
  assert.deepEqual(sleeps, [100, 200]);
});

test('retryWithBackoff gives up on a non-retryable error immediately', async () => {
  let calls = 0;
  await assert.rejects(
    retryWithBackoff(
      async () => {
        calls += 1;
        throw new ProviderError('not found', { httpStatus: 404 });
      },
      policy,
      { sleep: async () => {} },
    ),
    /not found/,
  );
  assert.equal(calls, 1);
});

test('retryWithBackoff rethrows the last error once attempts run out', async () => {
  const retries: number[] = [];
  await assert.rejects(
    retryWithBackoff(
      async (attempt) => {
        throw new ProviderError(`down #${attempt}`, { httpStatus: 503 });
      },
      policy,
      { sleep: async () => {}, onRetry: (_err, attempt) => retries.push(attempt) },
    ),
    /down #3/,
  );
  assert.deepEqual(retries, [1, 2]);
});
