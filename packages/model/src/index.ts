export type {
  DocumentCharacteristics,
  OptimizationParameters,
} from './document-characteristics';
export {
  DEFAULT_EXTRACTION_OPTIONS,
  type ExtractionOptions,
  type ExtractionOutcome,
  type ExtractionResult,
  type ExtractionType,
  type FailedPage,
  type ImageInfo,
  type OcrExtractionResult,
  type PageOutcome,
  type PageText,
  type StructuredElement,
  type StructuredElementType,
  type StructuredExtractionResult,
  type StructuredPage,
  type TableRows,
  type TextExtractionResult,
} from './extraction';
export {
  TERMINAL_TASK_STATUSES,
  isTerminalStatus,
  type OptimizationLogEntry,
  type OptimizationLogType,
  type TaskNotFound,
  type TaskSnapshot,
  type TaskStatus,
} from './task-progress';
