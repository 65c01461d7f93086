/**
 * Circuit breaker around the market-data provider. Three states:
 *
 *   CLOSED    → requests pass through
 *   OPEN      → provider assumed down, requests rejected without a call
 *   HALF_OPEN → cooldown elapsed, the next request is a probe
 *
 * Only failures classified as infrastructure (timeouts, 5xx, connection
 * errors) count towards the threshold. Rate limits and client errors pass
 * through without tripping it.
 */

import { ProviderError } from './errors.js';
import type { NowFn } from './rateLimiter.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive infrastructure failures before opening. Default 5. */
  failureThreshold?: number;
  /** Milliseconds to stay OPEN before probing. Default 30 000. */
  cooldownMs?: number;
  isInfraError?: (err: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  now?: NowFn;
}

export interface CircuitBreakerInfo {
  state: CircuitState;
  consecutiveFailures: number;
  cooldownRemainingMs: number;
}

/** Thrown when the circuit is OPEN and a request is rejected without calling the provider. */
export class CircuitOpenError extends ProviderError {
  readonly cooldownRemainingMs: number;

  constructor(cooldownRemainingMs: number) {
    super(`Circuit breaker is OPEN; provider requests blocked for ${Math.ceil(cooldownRemainingMs / 1000)}s`, {
      httpStatus: 503,
      retryable: false,
    });
    this.name = 'CircuitOpenError';
    this.cooldownRemainingMs = cooldownRemainingMs;
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private lastFailureMs = 0;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly isInfraError: (err: unknown) => boolean;
  private readonly onStateChange: ((from: CircuitState, to: CircuitState) => void) | null;
  private readonly now: NowFn;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = Math.max(1, options.failureThreshold ?? 5);
    this.cooldownMs = Math.max(0, options.cooldownMs ?? 30_000);
    this.isInfraError = options.isInfraError ?? (() => true);
    this.onStateChange = options.onStateChange ?? null;
    this.now = options.now ?? Date.now;
  }

  getState(): CircuitState {
    this.evaluateState();
    return this.state;
  }

  getInfo(): CircuitBreakerInfo {
    this.evaluateState();
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      cooldownRemainingMs: this.state === 'OPEN' ? Math.round(this.cooldownRemainingMs()) : 0,
    };
  }

  async call<T>(fn: () => Promise<T>): Promise<T> {
    this.evaluateState();
    if (this.state === 'OPEN') {
      throw new CircuitOpenError(this.cooldownRemainingMs());
    }
    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onError(err);
      throw err;
    }
  }

  reset(): void {
    this.transition('CLOSED');
    this.consecutiveFailures = 0;
    this.lastFailureMs = 0;
  }

  private evaluateState(): void {
    if (this.state === 'OPEN' && this.now() - this.lastFailureMs >= this.cooldownMs) {
      this.transition('HALF_OPEN');
    }
  }

  private onSuccess(): void {
    this.consecutiveFailures = 0;
    this.transition('CLOSED');
  }

  private onError(err: unknown): void {
    if (!this.isInfraError(err)) return;
    this.consecutiveFailures++;
    this.lastFailureMs = this.now();
    // A failed probe reopens immediately.
    if (this.state === 'HALF_OPEN' || this.consecutiveFailures >= this.failureThreshold) {
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.onStateChange?.(from, to);
  }

  private cooldownRemainingMs(): number {
    return Math.max(0, this.cooldownMs - (this.now() - this.lastFailureMs));
  }
}
