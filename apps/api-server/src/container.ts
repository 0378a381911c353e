import type { LoggerMethods } from '@pdfloom/logger';

import type { ServerConfig } from './config/server-config';
import type { AppDeps } from './types';

import { DocumentSampler, PdfExtractor } from '@pdfloom/pdf-parser';
import {
  ExtractionOrchestrator,
  MaintenanceScheduler,
  PerformanceOptimizer,
  TaskRegistry,
  TaskSubmissionService,
  UrlDocumentSource,
  createDownloadCache,
} from '@pdfloom/task-engine';

export interface Container extends AppDeps {
  scheduler: MaintenanceScheduler;
}

/**
 * Wire the production object graph from the server configuration.
 */
export function createContainer(
  config: ServerConfig,
  logger: LoggerMethods,
): Container {
  const registry = new TaskRegistry(logger, {
    activeRetentionMs: config.activeRetentionMs,
    taskRetentionMs: config.taskRetentionMs,
  });
  const extractor = new PdfExtractor(logger, {
    maxWorkers: config.maxWorkers,
    ocrLanguage: config.ocrLanguage,
    cacheTtlMs: config.cacheTtlMs,
    maxPageFailureRatio: config.maxPageFailureRatio,
  });
  const downloadCache = createDownloadCache(logger, config.cacheTtlMs);

  const orchestrator = new ExtractionOrchestrator(
    logger,
    {
      sampler: new DocumentSampler(logger),
      optimizer: new PerformanceOptimizer(logger),
      extractor,
    },
    { baseWorkers: config.maxWorkers },
  );
  const submissions = new TaskSubmissionService(logger, registry, orchestrator);

  const scheduler = new MaintenanceScheduler(
    logger,
    registry,
    [
      { name: 'extraction', sweep: () => extractor.sweepCaches() },
      { name: 'download', sweep: () => downloadCache.sweep() },
    ],
    { cronExpression: config.maintenanceCron },
  );

  return {
    logger,
    registry,
    submissions,
    extractor,
    downloadCache,
    scheduler,
    createUrlSource: (url, useCache) =>
      new UrlDocumentSource(
        url,
        {
          downloadDir: config.uploadDir,
          cache: downloadCache,
          useCache,
          timeoutMs: config.downloadTimeoutMs,
        },
        logger,
      ),
    uploadDir: config.uploadDir,
    maxUploadBytes: config.maxUploadBytes,
  };
}
