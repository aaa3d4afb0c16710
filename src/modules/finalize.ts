/**
 * Finalize Module
 * Waits for the last state write and builds the run summary
 *
 * Writes to context:
 * - summary
 */

import type { ExportContext, ExportSummary } from "../types";

export async function finalize(
  ctx: ExportContext,
  status: ExportSummary["status"],
): Promise<ExportSummary> {
  await ctx.store.flush();
  ctx.summary = ctx.tracker.getSummary(status);
  return ctx.summary;
}
