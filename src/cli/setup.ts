/**
 * Shared command setup: configuration, logger and the running-log source
 */

import { z } from "zod";
import { RunningLogSource } from "../running-log";
import {
  Logger,
  RateLimiter,
  RetryPolicy,
  WorkerPool,
  describeError,
  loadConfig,
  ownerPaths,
} from "../utils";
import type { OwnerPaths } from "../utils";
import type { ConfigError, ExporterConfig } from "../types";

export const AthleteIdSchema = z.string().regex(/^\d+$/, "Athlete id must be numeric");

export interface CommonOptions {
  athlete: string;
  output?: string;
  config?: string;
  verbose?: boolean;
}

export interface CommandSetup {
  config: ExporterConfig;
  configErrors: ConfigError[];
  logger: Logger;
  paths: OwnerPaths;
}

/**
 * Load configuration (default → user → custom) and apply the common flags
 */
export async function setupCommand(options: CommonOptions): Promise<CommandSetup> {
  const { config, errors } = await loadConfig(options.config);

  if (options.output) {
    config.export.directory = options.output;
  }

  const logger = new Logger(options.verbose ? "debug" : config.logging.level);
  for (const err of errors) {
    logger.warn(`Ignoring config file ${err.path}: ${describeError(err.error)}`);
  }

  const paths = ownerPaths(config.export.directory, options.athlete, {
    stateFile: config.export.stateFile,
    journalFile: config.journal.fileName,
  });

  return { config, configErrors: errors, logger, paths };
}

export function createRetryPolicy(config: ExporterConfig): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelay,
    maxDelayMs: config.retry.maxDelay,
  });
}

/**
 * Pool for workout pages: the shared bucket from `rateLimit` and a per-attempt timeout
 */
export function createWorkoutPool(config: ExporterConfig, logger: Logger): WorkerPool {
  return new WorkerPool({
    limiter: new RateLimiter(config.rateLimit),
    retryPolicy: createRetryPolicy(config),
    attemptTimeoutMs: config.source.timeout,
    logger,
  });
}

export function createSource(
  config: ExporterConfig,
  athleteId: string,
  logger: Logger,
): RunningLogSource {
  return new RunningLogSource({
    athleteId,
    baseUrl: config.source.baseUrl,
    timezone: config.export.timezone,
    timeout: config.source.timeout,
    userAgent: config.source.userAgent,
    maxPages: config.discovery.maxPages,
    discoveryConcurrency: config.discovery.concurrency,
    discoveryPool: new WorkerPool({
      limiter: new RateLimiter(config.discovery.rateLimit),
      retryPolicy: createRetryPolicy(config),
      attemptTimeoutMs: config.source.timeout,
      logger,
    }),
    logger,
  });
}
