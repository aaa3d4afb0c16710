/**
 * Worker Pool
 * Runs a unit of work over a list of items with bounded concurrency.
 * Every attempt passes the shared RateLimiter first; failures are classified
 * and retried according to the RetryPolicy. One item failing never stops the others.
 */

import type { ItemOutcome, PoolResult } from "../types";
import { CancelledError, TransientError, classifyFailure, describeError, retryAfterOf } from "./errors";
import type { Logger } from "./logger";
import type { RateLimiter } from "./rate-limiter";
import type { RetryPolicy } from "./retry-policy";
import { sleep as defaultSleep, type SleepFn } from "./sleep";

export interface AttemptContext {
  attempt: number; // 1-based
  signal: AbortSignal; // Aborts when the attempt times out
}

export type UnitOfWork<TItem, TResult> = (item: TItem, ctx: AttemptContext) => Promise<TResult>;

export interface WorkerPoolOptions {
  limiter: RateLimiter;
  retryPolicy: RetryPolicy;
  attemptTimeoutMs?: number; // Unset means attempts never time out
  sleep?: SleepFn;
  logger?: Logger;
}

export interface RunOptions<TItem, TResult> {
  concurrency?: number;
  signal?: AbortSignal; // Stops admitting new attempts
  onOutcome?: (item: TItem, outcome: ItemOutcome<TResult>) => void | Promise<void>;
}

export const DEFAULT_CONCURRENCY = 5;

export class WorkerPool {
  readonly limiter: RateLimiter;
  readonly retryPolicy: RetryPolicy;
  private attemptTimeoutMs?: number;
  private sleep: SleepFn;
  private logger?: Logger;

  constructor(options: WorkerPoolOptions) {
    this.limiter = options.limiter;
    this.retryPolicy = options.retryPolicy;
    this.attemptTimeoutMs = options.attemptTimeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
  }

  /**
   * Process every item and resolve with one outcome per item, in input order.
   * Never rejects because of an item failure.
   */
  async run<TItem, TResult>(
    items: readonly TItem[],
    unit: UnitOfWork<TItem, TResult>,
    options: RunOptions<TItem, TResult> = {},
  ): Promise<PoolResult<TItem, TResult>[]> {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error("concurrency must be an integer >= 1");
    }

    const outcomes = new Array<ItemOutcome<TResult> | undefined>(items.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < items.length && !options.signal?.aborted) {
        const index = cursor;
        cursor += 1;
        const item = items[index];
        const outcome = await this.processItem(item, unit, options.signal);
        outcomes[index] = outcome;
        this.notify(item, outcome, options.onOutcome);
      }
    };

    const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
    await Promise.all(workers);

    return items.map((item, index) => {
      const outcome = outcomes[index];
      if (outcome) {
        return { item, outcome };
      }
      // Never started: the run was cancelled first
      const cancelled: ItemOutcome<TResult> = { status: "cancelled", attempts: 0 };
      this.notify(item, cancelled, options.onOutcome);
      return { item, outcome: cancelled };
    });
  }

  private async processItem<TItem, TResult>(
    item: TItem,
    unit: UnitOfWork<TItem, TResult>,
    signal?: AbortSignal,
  ): Promise<ItemOutcome<TResult>> {
    let attempts = 0;

    for (;;) {
      try {
        await this.limiter.admit(signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return { status: "cancelled", attempts };
        }
        throw error;
      }

      attempts += 1;
      try {
        const value = await this.attempt(item, unit, attempts);
        return { status: "done", attempts, value };
      } catch (error) {
        const kind = classifyFailure(error);
        if (kind === "rate-limited") {
          this.limiter.penalize();
        }

        const decision = this.retryPolicy.decide(kind, attempts, retryAfterOf(error));
        if (decision.action === "give-up") {
          return { status: "failed", attempts, kind, reason: describeError(error) };
        }
        if (signal?.aborted) {
          return { status: "cancelled", attempts };
        }

        this.logger?.debug(
          `Attempt ${attempts} failed (${kind}): ${describeError(error)}; retrying in ${decision.delayMs}ms`,
        );
        try {
          await this.sleep(decision.delayMs, signal);
        } catch (sleepError) {
          if (sleepError instanceof CancelledError) {
            return { status: "cancelled", attempts };
          }
          throw sleepError;
        }
      }
    }
  }

  private async attempt<TItem, TResult>(
    item: TItem,
    unit: UnitOfWork<TItem, TResult>,
    attempt: number,
  ): Promise<TResult> {
    const controller = new AbortController();
    const timeoutMs = this.attemptTimeoutMs;
    const timeoutId =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            controller.abort(new TransientError(`Attempt timed out after ${timeoutMs}ms`));
          }, timeoutMs);

    try {
      return await unit(item, { attempt, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private notify<TItem, TResult>(
    item: TItem,
    outcome: ItemOutcome<TResult>,
    onOutcome?: (item: TItem, outcome: ItemOutcome<TResult>) => void | Promise<void>,
  ): void {
    if (!onOutcome) return;

    // Observers never hold up a worker
    void Promise.resolve()
      .then(() => onOutcome(item, outcome))
      .catch((error: unknown) => {
        this.logger?.warn(`Progress observer failed: ${describeError(error)}`);
      });
  }
}
