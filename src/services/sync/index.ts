// Sync Services - Re-exports
export { systemClock, type Clock } from "./clock.js";
export {
  DEFAULT_INTERVAL_MINUTES,
  DEFAULT_MODIFIED_SINCE,
  KyselyWatermarkStore,
  MemoryWatermarkStore,
  advanceWatermark,
  initializeWatermark,
  type WatermarkState,
  type WatermarkStore,
} from "./watermark.js";
export { readArtifact, removeArtifact, writeArtifact } from "./artifact.js";
export {
  KyselyRunJournal,
  type RunJournal,
  type RunOutcome,
} from "./runs.js";
export {
  LicenseExportStage,
  LicenseLoadStage,
  StageRunner,
  type CycleResult,
  type ExportStage,
  type LoadStage,
} from "./stages.js";
export {
  SyncScheduler,
  type CycleOutcome,
  type CycleRunner,
  type SchedulerOptions,
  type SchedulerResult,
} from "./scheduler.js";
export {
  createSyncPipeline,
  type SyncPipeline,
  type SyncPipelineOverrides,
} from "./pipeline.js";
