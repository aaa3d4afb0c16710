/**
 * Discover Module
 * Lists every workout id of the athlete
 *
 * Writes to context:
 * - discovered: ids, highest first
 */

import { CancelledError, DiscoveryError, describeError } from "../utils";
import type { ExportContext } from "../types";

export async function discover(ctx: ExportContext): Promise<void> {
  const { owner, discoverer, logger, tracker, signal } = ctx;

  let ids: number[];
  try {
    ids = await discoverer.listAllIdentifiers(owner, { signal });
  } catch (error) {
    if (error instanceof DiscoveryError || error instanceof CancelledError) {
      throw error;
    }
    throw new DiscoveryError(`Discovery failed for ${owner}: ${describeError(error)}`, {
      cause: error,
    });
  }

  ctx.discovered = [...new Set(ids)].sort((a, b) => b - a);
  tracker.setDiscovered(ctx.discovered.length);
  logger.info(`Discovered ${ctx.discovered.length} workouts for ${owner}`);
}
