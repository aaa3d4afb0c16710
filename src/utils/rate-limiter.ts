/**
 * Rate Limiter
 * Token bucket shared by every worker that talks to the same remote
 *
 * Tokens accrue continuously up to `capacity`. A caller that finds the bucket
 * empty reserves the next token (the balance goes negative) and sleeps exactly
 * until it is due, so waiters are served in call order without polling.
 */

import { CancelledError } from "./errors";
import { sleep as defaultSleep, type SleepFn } from "./sleep";

export interface RateLimiterOptions {
  capacity?: number;
  refillPerSecond?: number;
  now?: () => number; // Milliseconds
  sleep?: SleepFn;
}

export const DEFAULT_RATE_LIMIT = { capacity: 3, refillPerSecond: 3 } as const;

export class RateLimiter {
  readonly capacity: number;
  readonly refillPerSecond: number;
  private tokens: number;
  private lastRefill: number;
  private now: () => number;
  private sleep: SleepFn;

  constructor(options: RateLimiterOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_RATE_LIMIT.capacity;
    this.refillPerSecond = options.refillPerSecond ?? DEFAULT_RATE_LIMIT.refillPerSecond;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new Error("capacity must be an integer >= 1");
    }
    if (!(this.refillPerSecond > 0)) {
      throw new Error("refillPerSecond must be > 0");
    }

    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  /**
   * Suspend until one token is available, then consume it.
   * Rejects with CancelledError only when `signal` aborts; a reservation
   * abandoned that way is forfeited.
   */
  async admit(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) {
      return;
    }

    const waitMs = Math.ceil((-this.tokens / this.refillPerSecond) * 1000);
    await this.sleep(waitMs, signal);
  }

  /**
   * Drop any banked tokens so the next admission waits for a refill.
   * Called when the remote reports that the budget is exceeded.
   */
  penalize(): void {
    this.refill();
    if (this.tokens > 0) {
      this.tokens = 0;
    }
  }

  /** Whole tokens available right now */
  available(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens));
  }

  private refill(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed / 1000) * this.refillPerSecond);
    this.lastRefill = now;
  }
}
