/**
 * Central type exports
 */

// Configuration
export type {
  ExporterConfig,
  PartialExporterConfig,
  SourceConfig,
  RateLimitConfig,
  DiscoveryConfig,
  RetryConfig,
  ExportConfig,
  JournalConfig,
  LoggingConfig,
  ConfigError,
} from "./config";
export {
  ExporterConfigSchema,
  PartialExporterConfigSchema,
} from "./config";

// Pipeline
export type {
  WorkItemId,
  Artifact,
  ArtifactMetadata,
  FailureKind,
  ItemOutcome,
  PoolResult,
  FailedItem,
  ExportSummary,
  ExportPhase,
  ExportOverrides,
  PhaseProgress,
  RequestOptions,
  Discoverer,
  RecordFetcher,
  ArtifactWriter,
  ProgressObserver,
} from "./pipeline";

// Workouts
export type { Workout, WorkoutSegment, TimeOfDay } from "./workout";
export { WorkoutSchema, WorkoutSegmentSchema } from "./workout";

// State
export type { ExportState, PersistedState, StateV1, StateV2 } from "./state";
export {
  CURRENT_STATE_VERSION,
  PersistedStateSchema,
  StateV1Schema,
  StateV2Schema,
} from "./state";

// Context
export type { ExportContext } from "./context";
