import type { LoggerMethods } from '@pdfloom/logger';
import type { ExtractionOptions } from '@pdfloom/model';
import type { DocumentSampler, PdfExtractor } from '@pdfloom/pdf-parser';

import type { PerformanceOptimizer } from '../optimizer/performance-optimizer';
import type { ProgressTracker } from '../registry/progress-tracker';
import type {
  DocumentSource,
  ResolvedDocument,
} from '../sources/document-source';

import { ExtractionError } from '@pdfloom/pdf-parser';
import { round } from 'es-toolkit';

import { TASK_STEPS } from '../config/constants';

export interface ExtractionOrchestratorDeps {
  sampler: DocumentSampler;
  optimizer: PerformanceOptimizer;
  extractor: PdfExtractor;
}

export interface ExtractionOrchestratorOptions {
  /** Worker budget the optimizer starts from */
  baseWorkers: number;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Drives one extraction task from document resolution to completion.
 *
 * Each stage announces itself on the tracker before it runs:
 * analyzing (20) -> optimizing (40) -> processing (60) -> finalizing (90)
 * -> completed (100). Any failure ends the task in `error` with the failure
 * message. The resolved document is released whatever the outcome.
 */
export class ExtractionOrchestrator {
  private readonly now: () => number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly deps: ExtractionOrchestratorDeps,
    private readonly options: ExtractionOrchestratorOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Never rejects; failures are recorded on the tracker.
   */
  async run(
    tracker: ProgressTracker,
    source: DocumentSource,
    options: ExtractionOptions,
  ): Promise<void> {
    const taskId = tracker.taskId;
    const startTime = this.now();
    let document: ResolvedDocument | undefined;

    this.logger.info(
      `[ExtractionOrchestrator] ${taskId}: ${options.extractionType} ` +
        `extraction of ${source.description}`,
    );

    try {
      tracker.update(
        TASK_STEPS.INITIALIZING,
        'initializing',
        'Preparing document',
      );
      document = await source.resolve();

      tracker.update(
        TASK_STEPS.ANALYZING,
        'analyzing',
        'Sampling document pages',
      );
      let stageStart = this.now();
      const { characteristics } = await this.deps.sampler.sample(document.path);
      const analysisTime = this.secondsSince(stageStart);

      tracker.update(
        TASK_STEPS.OPTIMIZING,
        'optimizing',
        `Analyzed ${characteristics.pageCount} pages` +
          (characteristics.isScanned ? ' (scanned)' : ''),
      );
      stageStart = this.now();
      const params = this.deps.optimizer.analyze(
        characteristics,
        this.options.baseWorkers,
        tracker,
      );
      const optimizationTime = this.secondsSince(stageStart);

      tracker.update(
        TASK_STEPS.EXTRACTING,
        'processing',
        `Extracting with ${params.workers} workers`,
      );
      stageStart = this.now();
      const outcome = await this.deps.extractor.extract(
        document.path,
        options,
        params,
      );
      const extractionTime = this.secondsSince(stageStart);

      tracker.update(TASK_STEPS.FINALIZING, 'finalizing', 'Storing results');
      tracker.setResultData(outcome.content);
      const stats: Record<string, number> = {
        pageCount: characteristics.pageCount,
        fileSizeBytes: characteristics.fileSizeBytes,
        analysisTime,
        optimizationTime,
        extractionTime,
        executionTime: this.secondsSince(startTime),
        workers: params.workers,
        resolution: params.resolution,
        chunkSize: params.chunkSize,
        failedPages: outcome.content.failedPages.length,
        cacheHit: outcome.cacheHit ? 1 : 0,
      };
      for (const [name, value] of Object.entries(stats)) {
        tracker.addPerformanceStat(name, value);
      }

      tracker.complete(
        `Extracted ${outcome.content.pages} pages in ${stats.executionTime}s`,
      );
      this.logger.info(`[ExtractionOrchestrator] ${taskId}: completed`);
    } catch (error) {
      const message = ExtractionError.getErrorMessage(error);
      this.logger.error(`[ExtractionOrchestrator] ${taskId}: ${message}`);
      tracker.error(message);
    } finally {
      await this.release(taskId, document);
    }
  }

  private async release(
    taskId: string,
    document: ResolvedDocument | undefined,
  ): Promise<void> {
    if (!document) {
      return;
    }
    try {
      await document.release();
    } catch (error) {
      this.logger.warn(
        `[ExtractionOrchestrator] ${taskId}: failed to release ${document.path}: ${ExtractionError.getErrorMessage(error)}`,
      );
    }
  }

  private secondsSince(start: number): number {
    return round((this.now() - start) / 1000, 2);
  }
}
