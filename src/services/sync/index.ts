// Sync Services - Re-exports
export {
  SyncOrchestrator,
  SYNC_ORDER,
  groupEntities,
  selectEntities,
  type SyncProgress,
  type SyncRunOptions,
  type SyncSummary,
} from "./orchestrator.js";
export {
  runSyncJob,
  SkipCounter,
  type JobContext,
  type JobResult,
  type SkipReason,
  type SyncJob,
} from "./job.js";
export { SYNC_JOBS } from "./jobs/index.js";
export {
  WatermarkStore,
  DEFAULT_LOOKBACK_DAYS,
  ENTITY_CAPABILITIES,
} from "./watermarks.js";
export { IdentityResolver, billKey, type IdentityKind } from "./identity.js";
export {
  UpsertEngine,
  type MergeResult,
  type MergeSpec,
  type Row,
} from "./upsert.js";
export { normalize } from "./normalize/index.js";
