/**
 * Export context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type {
  ArtifactWriter,
  Discoverer,
  ExportOverrides,
  ExportSummary,
  ProgressObserver,
  RecordFetcher,
  WorkItemId,
} from "./pipeline";
import type { Logger } from "../utils/logger";
import type { StateStore } from "../utils/state-store";
import type { ExportTracker } from "../utils/tracker";
import type { WorkerPool } from "../utils/worker-pool";

export interface ExportContext {
  // Input - provided at initialization
  owner: string;
  concurrency: number;
  overrides: ExportOverrides;
  signal?: AbortSignal;

  // Collaborators
  discoverer: Discoverer;
  fetcher: RecordFetcher;
  writer: ArtifactWriter;
  store: StateStore;
  pool: WorkerPool;
  logger: Logger;
  observer?: ProgressObserver;

  // Counters and per-item failures
  tracker: ExportTracker;

  discovered?: WorkItemId[]; // Written by discover
  pending?: WorkItemId[]; // Written by computePending, descending
  summary?: ExportSummary; // Written by finalize
}
