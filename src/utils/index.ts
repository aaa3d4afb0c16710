/**
 * Utility exports
 */

// Errors
export {
  ItemError,
  TransientError,
  PermanentError,
  RateLimitedError,
  DiscoveryError,
  CorruptStateError,
  CancelledError,
  classifyFailure,
  retryAfterOf,
  describeError,
} from "./errors";

// Timing
export { sleep, raceSignal } from "./sleep";
export type { SleepFn } from "./sleep";

// Formatting
export { formatClock, formatPace, formatDuration, zonedIsoString, weekdayOf } from "./format";
export { parseIdList } from "./parse-id-list";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { writeAtomic } from "./write-atomic";
export { ownerPaths } from "./owner-paths";
export type { OwnerPaths } from "./owner-paths";

// Config utilities
export { loadConfig, getUserConfigPath, loadDefaultConfig, mergeConfig } from "./load-config";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { RateLimiter, DEFAULT_RATE_LIMIT } from "./rate-limiter";
export type { RateLimiterOptions } from "./rate-limiter";
export { RetryPolicy, DEFAULT_RETRY } from "./retry-policy";
export type { RetryDecision, RetryPolicyOptions } from "./retry-policy";
export { WorkerPool, DEFAULT_CONCURRENCY } from "./worker-pool";
export type { AttemptContext, UnitOfWork, WorkerPoolOptions, RunOptions } from "./worker-pool";
export { StateStore } from "./state-store";
export type { StateStoreOptions, StateFileWriter } from "./state-store";
export { ExportTracker } from "./tracker";
export type { ConfigIssue } from "./tracker";
