export {
  DOWNLOAD,
  EXTRACTION_STEP_DESCRIPTIONS,
  EXTRACTION_TOTAL_STEPS,
  TASK_RETENTION,
  TASK_STEPS,
} from './config/constants';
export { DownloadError, DuplicateTaskError } from './errors/task-errors';
export { MaintenanceScheduler } from './maintenance/maintenance-scheduler';
export type {
  MaintenanceResult,
  MaintenanceSchedulerOptions,
  SweepableCache,
} from './maintenance/maintenance-scheduler';
export { PerformanceOptimizer } from './optimizer/performance-optimizer';
export type { OptimizationLogSink } from './optimizer/performance-optimizer';
export { ExtractionOrchestrator } from './orchestrator/extraction-orchestrator';
export type {
  ExtractionOrchestratorDeps,
  ExtractionOrchestratorOptions,
} from './orchestrator/extraction-orchestrator';
export { ProgressTracker } from './registry/progress-tracker';
export type { TaskStore } from './registry/progress-tracker';
export { TaskRegistry } from './registry/task-registry';
export type { TaskRegistryOptions } from './registry/task-registry';
export { createDownloadCache } from './sources/download-cache';
export type { DownloadCache } from './sources/download-cache';
export type {
  DocumentSource,
  ResolvedDocument,
} from './sources/document-source';
export { FileDocumentSource } from './sources/file-document-source';
export { UrlDocumentSource } from './sources/url-document-source';
export type { UrlDocumentSourceOptions } from './sources/url-document-source';
export { TaskSubmissionService } from './submission/task-submission-service';
export type { SubmittedTask } from './submission/task-submission-service';
