/**
 * Pending Module
 * Loads the athlete's state, applies overrides and works out what is left to export
 *
 * Writes to context:
 * - pending: discovered ids that are not done, highest first
 */

import type { ExportContext } from "../types";

export async function computePending(ctx: ExportContext): Promise<void> {
  const { store, writer, overrides, logger, tracker } = ctx;
  const discovered = ctx.discovered ?? [];

  await store.load();

  switch (overrides.kind) {
    case "none":
      break;
    case "force-all": {
      await store.clear();
      const removed = await writer.discard();
      logger.info(`Forcing a full re-export (${removed} existing files removed)`);
      break;
    }
    case "force-subset": {
      const known = new Set(discovered);
      const unknown = overrides.ids.filter((id) => !known.has(id));
      if (unknown.length > 0) {
        logger.warn(`Ignoring ids that were not discovered: ${unknown.join(", ")}`);
      }
      const ids = overrides.ids.filter((id) => known.has(id));
      await store.remove(ids);
      const removed = await writer.discard(ids);
      logger.info(`Re-exporting ${ids.length} workouts (${removed} existing files removed)`);
      break;
    }
  }

  await store.recordDiscovered(discovered);

  const pending = discovered.filter((id) => !store.isDone(id)).sort((a, b) => b - a);
  ctx.pending = pending;
  tracker.setPending(pending.length);
  tracker.setSkipped(discovered.length - pending.length);
  logger.debug(`${pending.length} pending, ${discovered.length - pending.length} already done`);
}
