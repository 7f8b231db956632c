/**
 * Circuit Breaker: stops a refresh cycle from hammering the quote provider
 * once it is clearly down. Three states:
 *
 *   CLOSED    → normal operation, calls pass through
 *   OPEN      → provider assumed down, calls rejected with CircuitOpenError
 *   HALF_OPEN → cooldown elapsed, the next call is a probe
 *
 * Only infrastructure failures (timeouts, 5xx, network errors) count toward
 * the threshold. Missing symbols, rate limits and aborts are forwarded
 * untouched.
 */

import { CircuitOpenError } from './errors.js';

export { CircuitOpenError };

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive infrastructure failures before opening. Default 5. */
  failureThreshold?: number;
  /** Milliseconds to stay OPEN before probing. Default 30 000. */
  cooldownMs?: number;
  isInfraError?: (err: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  now?: () => number;
}

export interface CircuitInfo {
  state: CircuitState;
  consecutiveFailures: number;
  cooldownRemainingMs: number;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private lastFailureMs = 0;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly isInfraError: (err: unknown) => boolean;
  private readonly onStateChange: ((from: CircuitState, to: CircuitState) => void) | null;
  private readonly now: () => number;

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

  getInfo(): CircuitInfo {
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
    const prev = this.state;
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
    this.lastFailureMs = 0;
    if (prev !== 'CLOSED') this.onStateChange?.(prev, 'CLOSED');
  }

  private evaluateState(): void {
    if (this.state === 'OPEN' && this.now() - this.lastFailureMs >= this.cooldownMs) {
      this.state = 'HALF_OPEN';
      this.onStateChange?.('OPEN', 'HALF_OPEN');
    }
  }

  private onSuccess(): void {
    const prev = this.state;
    this.consecutiveFailures = 0;
    this.state = 'CLOSED';
    if (prev !== 'CLOSED') this.onStateChange?.(prev, 'CLOSED');
  }

  private onError(err: unknown): void {
    if (!this.isInfraError(err)) return;

    this.consecutiveFailures++;
    this.lastFailureMs = this.now();

    // A failed probe reopens immediately.
    if (this.state === 'HALF_OPEN' || (this.consecutiveFailures >= this.failureThreshold && this.state !== 'OPEN')) {
      const prev = this.state;
      this.state = 'OPEN';
      this.onStateChange?.(prev, 'OPEN');
    }
  }

  private cooldownRemainingMs(): number {
    return Math.max(0, this.cooldownMs - (this.now() - this.lastFailureMs));
  }
}
