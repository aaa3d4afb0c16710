/**
 * Export pipeline types
 */

// ============================================================================
// Work items and artifacts
// ============================================================================

/** Stable identifier of one remote workout (running-log "WID") */
export type WorkItemId = number;

export interface ArtifactMetadata {
  date: string; // YYYY-MM-DD
  title?: string;
}

/** Converted, ready-to-write form of one workout */
export interface Artifact {
  fileName: string;
  content: string;
  metadata: ArtifactMetadata;
}

// ============================================================================
// Outcomes
// ============================================================================

export type FailureKind = "rate-limited" | "transient" | "permanent";

export type ItemOutcome<TResult = void> =
  | { status: "done"; attempts: number; value: TResult }
  | { status: "failed"; attempts: number; kind: FailureKind; reason: string }
  | { status: "cancelled"; attempts: number };

export interface PoolResult<TItem, TResult> {
  item: TItem;
  outcome: ItemOutcome<TResult>;
}

export interface FailedItem {
  id: WorkItemId;
  kind: FailureKind;
  reason: string;
  attempts: number;
}

export interface ExportSummary {
  status: "completed" | "cancelled";
  owner: string;
  discovered: number;
  pending: number;
  succeeded: number;
  failed: number;
  skipped: number; // already done before this run
  cancelled: number; // pending items left for the next run
  failures: FailedItem[];
  duration: number; // In milliseconds
}

// ============================================================================
// Orchestration
// ============================================================================

export type ExportPhase =
  | "idle"
  | "discovering"
  | "computing-pending"
  | "executing"
  | "finalizing"
  | "completed"
  | "cancelled"
  | "failed";

export type ExportOverrides =
  | { kind: "none" }
  | { kind: "force-all" }
  | { kind: "force-subset"; ids: readonly WorkItemId[] };

export interface PhaseProgress {
  discovered: number;
  pending: number;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface Discoverer {
  listAllIdentifiers(owner: string, options?: RequestOptions): Promise<WorkItemId[]>;
}

export interface RecordFetcher {
  fetchAndConvert(id: WorkItemId, options?: RequestOptions): Promise<Artifact>;
}

export interface ArtifactWriter {
  /** Resolves with the written file path */
  write(id: WorkItemId, artifact: Artifact): Promise<string>;
  /** Removes artifacts of the given ids, or all artifacts; resolves with the removed count */
  discard(ids?: readonly WorkItemId[]): Promise<number>;
}

/**
 * Notified fire-and-forget; never awaited by the pipeline
 */
export interface ProgressObserver {
  onItemOutcome(id: WorkItemId, outcome: ItemOutcome): void | Promise<void>;
  onPhase?(phase: ExportPhase, progress: PhaseProgress): void;
}
