/**
 * Retry Policy
 * Decides, per failed attempt, whether to try again and after how long
 */

import type { FailureKind } from "../types";

export type RetryDecision =
  | { action: "retry"; delayMs: number }
  | { action: "give-up" };

export interface RetryPolicyOptions {
  maxAttempts?: number; // Total tries, including the first
  baseDelayMs?: number;
  maxDelayMs?: number;
  randomFn?: () => number;
}

export const DEFAULT_RETRY = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
} as const;

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  private randomFn: () => number;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RETRY.maxAttempts;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs;
    this.randomFn = options.randomFn ?? Math.random;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new Error("maxAttempts must be an integer >= 1");
    }
    if (this.baseDelayMs < 0 || this.maxDelayMs < 0) {
      throw new Error("retry delays must be >= 0");
    }
  }

  /**
   * Upper bound of the backoff window before the given retry
   * base * 2^(attempt-1), capped at maxDelayMs
   */
  backoffCeiling(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt - 1));
  }

  /**
   * @param attempt - attempts made so far (1 after the first failure)
   * @param retryAfterMs - delay requested by the remote, used as a floor
   */
  decide(kind: FailureKind, attempt: number, retryAfterMs?: number): RetryDecision {
    if (kind === "permanent" || attempt >= this.maxAttempts) {
      return { action: "give-up" };
    }

    // Full jitter: uniform in [0, ceiling]
    const random = Math.min(1, Math.max(0, this.randomFn()));
    const jittered = Math.round(random * this.backoffCeiling(attempt));

    const floor =
      typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs) && retryAfterMs > 0
        ? retryAfterMs
        : 0;

    return { action: "retry", delayMs: Math.min(this.maxDelayMs, Math.max(jittered, floor)) };
  }
}
