/**
 * running-log.com source
 * Lists an athlete's workout ids and fetches single workouts as JSON artifacts
 */

import type { Artifact, Discoverer, RecordFetcher, RequestOptions, WorkItemId, Workout } from "./types";
import { extractLastPage, extractWorkoutIds, parseWorkout } from "./parsers";
import {
  CancelledError,
  DiscoveryError,
  ItemError,
  PermanentError,
  RateLimitedError,
  RateLimiter,
  RetryPolicy,
  TransientError,
  WorkerPool,
  describeError,
} from "./utils";
import type { Logger } from "./utils";

export interface RunningLogSourceOptions {
  athleteId: string;
  baseUrl?: string;
  timezone?: string;
  timeout?: number; // In milliseconds, per request
  userAgent?: string;
  maxPages?: number;
  discoveryPool?: WorkerPool; // Paces list page requests
  discoveryConcurrency?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const DEFAULT_BASE_URL = "http://running-log.com";
const DEFAULT_TIMEOUT = 30000;
const DEFAULT_MAX_PAGES = 1000;
const DEFAULT_USER_AGENT = "workout-exporter";

/**
 * Retry-After is either delay-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export class RunningLogSource implements Discoverer, RecordFetcher {
  readonly athleteId: string;
  private baseUrl: string;
  private timezone: string;
  private timeout: number;
  private userAgent: string;
  private maxPages: number;
  private discoveryPool: WorkerPool;
  private discoveryConcurrency: number;
  private fetchFn: typeof fetch;
  private logger?: Logger;

  constructor(options: RunningLogSourceOptions) {
    this.athleteId = options.athleteId;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timezone = options.timezone ?? "America/New_York";
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.discoveryConcurrency = options.discoveryConcurrency ?? 5;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
    this.discoveryPool =
      options.discoveryPool ??
      new WorkerPool({
        limiter: new RateLimiter({ capacity: 10, refillPerSecond: 10 }),
        retryPolicy: new RetryPolicy(),
        logger: options.logger,
      });
  }

  listUrl(owner: string, page: number): string {
    return `${this.baseUrl}/workouts?athleteid=${encodeURIComponent(owner)}&page=${page}`;
  }

  workoutUrl(id: WorkItemId): string {
    return `${this.baseUrl}/workouts/${id}?athleteid=${encodeURIComponent(this.athleteId)}`;
  }

  // ============================================================================
  // Discovery
  // ============================================================================

  /**
   * Every workout id of the athlete, highest first.
   * Throws DiscoveryError when the first list page cannot be read.
   */
  async listAllIdentifiers(owner: string, options: RequestOptions = {}): Promise<WorkItemId[]> {
    const { signal } = options;

    const [first] = await this.discoveryPool.run(
      [1],
      (page, attempt) => this.fetchPage(this.listUrl(owner, page), attempt.signal),
      { concurrency: 1, signal },
    );
    if (first.outcome.status === "cancelled") {
      throw new CancelledError();
    }
    if (first.outcome.status === "failed") {
      throw new DiscoveryError(
        `Could not read the workout list of athlete ${owner}: ${first.outcome.reason}`,
      );
    }

    const firstPage = first.outcome.value;
    const ids = new Set(extractWorkoutIds(firstPage));
    const lastPage = Math.min(this.maxPages, extractLastPage(firstPage));
    this.logger?.debug(`Athlete ${owner}: ${lastPage} workout list page(s)`);

    const pages: number[] = [];
    for (let page = 2; page <= lastPage; page++) pages.push(page);

    const results = await this.discoveryPool.run(
      pages,
      async (page, attempt) => {
        try {
          return extractWorkoutIds(await this.fetchPage(this.listUrl(owner, page), attempt.signal));
        } catch (error) {
          // The listing ends early
          if (error instanceof PermanentError && error.status === 404) {
            this.logger?.debug(`Workout list page ${page} not found, treating it as the end`);
            return [];
          }
          throw error;
        }
      },
      { concurrency: this.discoveryConcurrency, signal },
    );

    for (const { item: page, outcome } of results) {
      if (outcome.status === "done") {
        for (const id of outcome.value) ids.add(id);
      } else if (outcome.status === "failed") {
        this.logger?.warn(`Skipping workout list page ${page}: ${outcome.reason}`);
      }
    }

    if (signal?.aborted) {
      throw new CancelledError();
    }

    if (ids.size === 0) {
      this.logger?.warn(`No workouts found for athlete ${owner}`);
    }
    return [...ids].sort((a, b) => b - a);
  }

  // ============================================================================
  // Single workouts
  // ============================================================================

  async fetchAndConvert(id: WorkItemId, options: RequestOptions = {}): Promise<Artifact> {
    const html = await this.fetchPage(this.workoutUrl(id), options.signal);

    let workout: Workout;
    try {
      workout = parseWorkout(html, { wid: id, athleteId: this.athleteId, timezone: this.timezone });
    } catch (error) {
      if (error instanceof ItemError) throw error;
      throw new PermanentError(`Workout ${id}: ${describeError(error)}`, { cause: error });
    }

    return {
      fileName: `${workout.date}_wid${id}.json`,
      content: JSON.stringify(workout, null, 2) + "\n",
      metadata: { date: workout.date, title: workout.title },
    };
  }

  // ============================================================================
  // HTTP
  // ============================================================================

  /**
   * GET a page and map the response to the item error taxonomy
   */
  async fetchPage(url: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort(new TransientError(`Request timed out after ${this.timeout}ms: ${url}`));
    }, this.timeout);
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) onAbort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: { "User-Agent": this.userAgent },
        redirect: "follow",
      });

      if (response.url.includes("/athlete/login")) {
        throw new PermanentError(`Redirected to the login page for ${url}; the log is not public`, {
          status: response.status,
        });
      }
      if (response.status === 429) {
        throw new RateLimitedError(`Rate limited by running-log.com: ${url}`, {
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
        });
      }
      if (response.status >= 500) {
        throw new TransientError(`HTTP ${response.status}: ${response.statusText} (${url})`, {
          status: response.status,
        });
      }
      if (!response.ok) {
        throw new PermanentError(`HTTP ${response.status}: ${response.statusText} (${url})`, {
          status: response.status,
        });
      }

      return await response.text();
    } catch (error) {
      if (error instanceof ItemError || error instanceof CancelledError) throw error;
      // Network failures and aborts
      throw new TransientError(`Request failed for ${url}: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
