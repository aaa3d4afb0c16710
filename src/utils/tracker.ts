/**
 * Export Tracker
 * Counters and issues for one export run
 */

import type { ExportSummary, FailedItem, ItemOutcome, WorkItemId } from "../types";
import { describeError } from "./errors";
import { writeAtomic } from "./write-atomic";

export interface ConfigIssue {
  path: string;
  details: string;
}

export class ExportTracker {
  private discovered = 0;
  private pending = 0;
  private skipped = 0;
  private succeeded = 0;
  private cancelled = 0;
  private failures: FailedItem[] = [];
  private configIssues: ConfigIssue[] = [];
  private startTime: number;

  constructor(
    readonly owner: string,
    private now: () => number = () => Date.now(),
  ) {
    this.startTime = now();
  }

  // ============================================================================
  // Stat counters
  // ============================================================================

  setDiscovered(count: number): void {
    this.discovered = count;
  }

  setPending(count: number): void {
    this.pending = count;
  }

  setSkipped(count: number): void {
    this.skipped = count;
  }

  recordOutcome(id: WorkItemId, outcome: ItemOutcome<unknown>): void {
    switch (outcome.status) {
      case "done":
        this.succeeded++;
        break;
      case "failed":
        this.failures.push({
          id,
          kind: outcome.kind,
          reason: outcome.reason,
          attempts: outcome.attempts,
        });
        break;
      case "cancelled":
        this.cancelled++;
        break;
    }
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackConfigError(path: string, error: unknown): void {
    this.configIssues.push({ path, details: describeError(error) });
  }

  getConfigIssues(): ConfigIssue[] {
    return this.configIssues;
  }

  // ============================================================================
  // Results
  // ============================================================================

  getSummary(status: ExportSummary["status"]): ExportSummary {
    return {
      status,
      owner: this.owner,
      discovered: this.discovered,
      pending: this.pending,
      succeeded: this.succeeded,
      failed: this.failures.length,
      skipped: this.skipped,
      cancelled: this.cancelled,
      failures: [...this.failures].sort((a, b) => b.id - a.id),
      duration: this.now() - this.startTime,
    };
  }

  /**
   * Write the run's stats file (stats.json in the athlete directory)
   */
  async exportStats(statsPath: string, summary: ExportSummary): Promise<string> {
    const exported = {
      summary: {
        status: summary.status,
        owner: summary.owner,
        discovered: summary.discovered,
        pending: summary.pending,
        succeeded: summary.succeeded,
        failed: summary.failed,
        skipped: summary.skipped,
        cancelled: summary.cancelled,
        duration: summary.duration,
      },
      failures: this.groupFailuresByKind(summary.failures),
      configIssues: this.configIssues,
    };

    await writeAtomic(statsPath, JSON.stringify(exported, null, 2));
    return statsPath;
  }

  private groupFailuresByKind(failures: FailedItem[]): Record<string, FailedItem[]> {
    const grouped: Record<string, FailedItem[]> = {};
    for (const failure of failures) {
      (grouped[failure.kind] ??= []).push(failure);
    }
    return grouped;
  }
}
