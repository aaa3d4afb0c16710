/**
 * Exporter
 * Runs the export pipeline for one athlete:
 * idle → discovering → computing-pending → executing → finalizing → completed | cancelled | failed
 */

import * as modules from "./modules";
import { CancelledError, DEFAULT_CONCURRENCY, ExportTracker, Logger, describeError } from "./utils";
import type { StateStore, WorkerPool } from "./utils";
import type {
  ArtifactWriter,
  Discoverer,
  ExportContext,
  ExportOverrides,
  ExportPhase,
  ExportSummary,
  ProgressObserver,
  RecordFetcher,
} from "./types";

export interface ExportDependencies {
  discoverer: Discoverer;
  fetcher: RecordFetcher;
  writer: ArtifactWriter;
  store: StateStore;
  pool: WorkerPool;
  logger?: Logger;
  observer?: ProgressObserver;
  tracker?: ExportTracker;
}

export interface StartExportOptions {
  owner: string;
  concurrency?: number;
  overrides?: ExportOverrides;
  signal?: AbortSignal;
}

export class Exporter {
  private phase: ExportPhase = "idle";
  private ctx: ExportContext;

  constructor(deps: ExportDependencies, options: StartExportOptions) {
    this.ctx = {
      owner: options.owner,
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
      overrides: options.overrides ?? { kind: "none" },
      signal: options.signal,
      discoverer: deps.discoverer,
      fetcher: deps.fetcher,
      writer: deps.writer,
      store: deps.store,
      pool: deps.pool,
      logger: deps.logger ?? new Logger("warn"),
      observer: deps.observer,
      tracker: deps.tracker ?? new ExportTracker(options.owner),
    };
  }

  getPhase(): ExportPhase {
    return this.phase;
  }

  /**
   * Run the pipeline once.
   * Rejects with DiscoveryError or CorruptStateError before any workout is touched;
   * workout failures only show up in the summary.
   */
  async run(): Promise<ExportSummary> {
    if (this.phase !== "idle") {
      throw new Error(`Exporter already ran (phase: ${this.phase})`);
    }
    const { ctx } = this;

    try {
      this.transition("discovering");
      await modules.discover(ctx);

      this.transition("computing-pending");
      await modules.computePending(ctx);

      if (ctx.pending?.length === 0) {
        const summary = await modules.finalize(ctx, "completed");
        this.transition("completed");
        return summary;
      }

      this.transition("executing");
      await modules.execute(ctx);

      this.transition("finalizing");
      const cancelled = ctx.tracker.getSummary("completed").cancelled > 0;
      const summary = await modules.finalize(ctx, cancelled ? "cancelled" : "completed");
      this.transition(summary.status);
      return summary;
    } catch (error) {
      if (error instanceof CancelledError) {
        const summary = await modules.finalize(ctx, "cancelled");
        this.transition("cancelled");
        return summary;
      }
      this.transition("failed");
      throw error;
    }
  }

  private transition(phase: ExportPhase): void {
    this.phase = phase;
    this.ctx.logger.debug(`Export phase: ${phase}`);

    try {
      this.ctx.observer?.onPhase?.(phase, {
        discovered: this.ctx.discovered?.length ?? 0,
        pending: this.ctx.pending?.length ?? 0,
      });
    } catch (error) {
      this.ctx.logger.warn(`Progress observer failed: ${describeError(error)}`);
    }
  }
}

/**
 * Export every pending workout of one athlete
 */
export function startExport(
  deps: ExportDependencies,
  options: StartExportOptions,
): Promise<ExportSummary> {
  return new Exporter(deps, options).run();
}
