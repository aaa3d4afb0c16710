/**
 * Execute Module
 * Fetches, writes and marks done every pending workout through the worker pool
 */

import { raceSignal } from "../utils";
import type { ExportContext, ItemOutcome, WorkItemId } from "../types";

function withoutValue(outcome: ItemOutcome<string>): ItemOutcome {
  return outcome.status === "done"
    ? { status: "done", attempts: outcome.attempts, value: undefined }
    : outcome;
}

export async function execute(ctx: ExportContext): Promise<void> {
  const { fetcher, writer, store, pool, observer, logger, tracker, signal } = ctx;
  const pending = ctx.pending ?? [];

  const results = await pool.run<WorkItemId, string>(
    pending,
    async (id, attempt) => {
      // Only the fetch is bounded by the attempt timeout; writes run to completion
      const artifact = await raceSignal(
        fetcher.fetchAndConvert(id, { signal: attempt.signal }),
        attempt.signal,
      );
      const filepath = await writer.write(id, artifact);
      await store.markDone(id);
      return filepath;
    },
    {
      concurrency: ctx.concurrency,
      signal,
      onOutcome: (id, outcome) => {
        if (outcome.status === "done") {
          logger.debug(`Workout ${id} saved to ${outcome.value}`);
        } else if (outcome.status === "failed") {
          logger.warn(`Workout ${id} failed after ${outcome.attempts} attempt(s): ${outcome.reason}`);
        }
        return observer?.onItemOutcome(id, withoutValue(outcome));
      },
    },
  );

  for (const { item, outcome } of results) {
    tracker.recordOutcome(item, outcome);
  }
}
