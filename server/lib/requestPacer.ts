import { sleepWithAbort } from './abortUtils.js';
import { buildAbortError } from './errors.js';

export interface RequestPacerOptions {
  baseSpacingMs: number;
  jitterMs: number;
  maxSpacingMs: number;
  random?: () => number;
}

/** Smallest spacing a rate-limit backoff starts doubling from. */
const MIN_BACKOFF_SPACING_MS = 250;

/**
 * Per-cycle pacing: every upstream call first waits the current spacing plus
 * uniform jitter in `[0, jitterMs)`. A rate-limit response doubles the
 * spacing for the rest of the cycle, capped at `maxSpacingMs`.
 */
export class RequestPacer {
  private spacingMs: number;
  private rateLimitedCount = 0;
  private readonly jitterMs: number;
  private readonly maxSpacingMs: number;
  private readonly random: () => number;

  constructor(options: RequestPacerOptions) {
    this.spacingMs = Math.max(0, options.baseSpacingMs);
    this.jitterMs = Math.max(0, options.jitterMs);
    this.maxSpacingMs = Math.max(this.spacingMs, options.maxSpacingMs);
    this.random = options.random ?? Math.random;
  }

  nextDelayMs(): number {
    const jitter = this.jitterMs > 0 ? Math.floor(this.random() * this.jitterMs) : 0;
    return this.spacingMs + jitter;
  }

  async wait(signal?: AbortSignal | null): Promise<void> {
    const delayMs = this.nextDelayMs();
    if (delayMs <= 0) {
      if (signal?.aborted) throw buildAbortError('Request aborted while pacing');
      return;
    }
    await sleepWithAbort(delayMs, signal);
  }

  backOff(): number {
    this.rateLimitedCount += 1;
    this.spacingMs = Math.min(this.maxSpacingMs, Math.max(MIN_BACKOFF_SPACING_MS, this.spacingMs * 2));
    return this.spacingMs;
  }

  getSpacingMs(): number {
    return this.spacingMs;
  }

  getRateLimitedCount(): number {
    return this.rateLimitedCount;
  }
}

/**
 * Process-wide token bucket bounding the request rate to one upstream host,
 * independent of how many cycles or pool workers are running.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillMs: number;
  private readonly capacity: number;
  private readonly ratePerSecond: number;
  private readonly now: () => number;

  constructor(options: { ratePerSecond: number; capacity?: number; now?: () => number }) {
    this.ratePerSecond = Math.max(1, options.ratePerSecond);
    this.capacity = Math.max(1, options.capacity ?? this.ratePerSecond);
    this.now = options.now ?? Date.now;
    this.tokens = this.capacity;
    this.lastRefillMs = this.now();
  }

  private refill(nowMs: number): void {
    const elapsedMs = Math.max(0, nowMs - this.lastRefillMs);
    if (elapsedMs <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs * this.ratePerSecond) / 1000);
    this.lastRefillMs = nowMs;
  }

  tryAcquire(): boolean {
    this.refill(this.now());
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  async acquire(signal?: AbortSignal | null): Promise<void> {
    while (true) {
      if (signal && signal.aborted) {
        throw buildAbortError('Request aborted while waiting for rate-limit slot');
      }
      if (this.tryAcquire()) return;
      const missingTokens = Math.max(0, 1 - this.tokens);
      const waitMs = Math.ceil((missingTokens * 1000) / this.ratePerSecond);
      await sleepWithAbort(Math.max(1, waitMs), signal);
    }
  }
}
