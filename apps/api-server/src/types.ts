import type { LoggerMethods } from '@pdfloom/logger';
import type { PdfExtractor } from '@pdfloom/pdf-parser';
import type {
  DocumentSource,
  DownloadCache,
  TaskRegistry,
  TaskSubmissionService,
} from '@pdfloom/task-engine';

/**
 * Collaborators the HTTP layer is built from.
 */
export interface AppDeps {
  logger: LoggerMethods;
  registry: TaskRegistry;
  submissions: TaskSubmissionService;
  extractor: PdfExtractor;
  downloadCache: DownloadCache;
  /** Source for a remote PDF, sharing the download cache */
  createUrlSource: (url: string, useCache: boolean) => DocumentSource;
  uploadDir: string;
  maxUploadBytes: number;
}
