/**
 * Drama Collector — Rate Limiter
 *
 * Token bucket. Tokens refill continuously at `ratePerSecond` up to `burst`.
 * Waiters are served in arrival order; a waiter sleeps on the clock until the
 * bucket can cover one token.
 *
 * A rate of 0 starts empty and never refills, so acquire() never resolves.
 * A rate of Infinity never limits.
 */

import { systemClock, type Clock } from './clock';

export interface RateLimiterOptions {
  ratePerSecond: number;
  /** Bucket capacity, default max(1, ratePerSecond) */
  burst?: number;
  clock?: Clock;
}

export class RateLimiter {
  readonly ratePerSecond: number;
  readonly capacity: number;

  private readonly clock: Clock;
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.ratePerSecond = Math.max(0, options.ratePerSecond);
    this.capacity = Math.max(1, options.burst ?? this.ratePerSecond);
    this.clock = options.clock ?? systemClock;
    if (this.ratePerSecond === 0) {
      this.tokens = 0;
    } else {
      this.tokens = Number.isFinite(this.capacity) ? this.capacity : 1;
    }
    this.lastRefill = this.clock.now();
  }

  get unlimited(): boolean {
    return !Number.isFinite(this.ratePerSecond);
  }

  /**
   * Tokens available right now.
   */
  available(): number {
    if (this.unlimited) return Number.POSITIVE_INFINITY;
    this.refill();
    return this.tokens;
  }

  /**
   * Take a token if one is available. Never waits.
   */
  tryAcquire(): boolean {
    if (this.unlimited) return true;
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait for a token, then take it.
   */
  acquire(): Promise<void> {
    if (this.unlimited) return Promise.resolve();

    const turn = this.tail.then(() => this.waitForToken());
    this.tail = turn;
    return turn;
  }

  private async waitForToken(): Promise<void> {
    while (!this.tryAcquire()) {
      if (this.ratePerSecond === 0) {
        return new Promise<void>(() => {});
      }
      const deficit = 1 - this.tokens;
      await this.clock.sleep(Math.ceil((deficit / this.ratePerSecond) * 1000));
    }
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.ratePerSecond);
    this.lastRefill = now;
  }
}
