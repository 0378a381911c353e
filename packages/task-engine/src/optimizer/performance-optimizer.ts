import type { LoggerMethods } from '@pdfloom/logger';
import type {
  DocumentCharacteristics,
  OptimizationLogType,
  OptimizationParameters,
} from '@pdfloom/model';

import { round } from 'es-toolkit';

import { OPTIMIZER } from '../config/constants';

/** Receives one rationale line per decision, e.g. a ProgressTracker */
export interface OptimizationLogSink {
  addOptimizationLog(message: string, type: OptimizationLogType): void;
}

/**
 * Chooses processing parameters from document characteristics.
 *
 * The four decisions (workers, DPI, preprocessing, chunk size) are
 * independent rule tables over the page count and the average page size.
 * The result depends on the inputs only; the log sink just observes.
 */
export class PerformanceOptimizer {
  constructor(private readonly logger: LoggerMethods) {}

  analyze(
    characteristics: DocumentCharacteristics,
    baseWorkers: number,
    sink?: OptimizationLogSink,
  ): OptimizationParameters {
    const base = Math.max(1, Math.floor(baseWorkers));
    const { pageCount, isScanned } = characteristics;
    const avgPageSize = PerformanceOptimizer.averagePageSize(characteristics);

    const params: OptimizationParameters = {
      workers: PerformanceOptimizer.workers(
        pageCount,
        avgPageSize,
        isScanned,
        base,
      ),
      resolution: PerformanceOptimizer.resolution(avgPageSize),
      preprocess: PerformanceOptimizer.preprocess(avgPageSize, isScanned),
      chunkSize: PerformanceOptimizer.chunkSize(pageCount),
    };

    if (sink) {
      sink.addOptimizationLog(
        `Optimized worker count: ${params.workers} ` +
          `(based on ${pageCount} pages, ` +
          `${round(avgPageSize / 1024, 1)}KB avg page size)`,
        'worker_optimization',
      );
      sink.addOptimizationLog(
        `Optimized OCR DPI: ${params.resolution}` +
          (params.resolution < OPTIMIZER.DEFAULT_DPI
            ? ' (reduced for performance)'
            : ''),
        'dpi_optimization',
      );
      sink.addOptimizationLog(
        `Image preprocessing: ${params.preprocess}`,
        'preprocessing_optimization',
      );
      if (params.chunkSize > 1) {
        sink.addOptimizationLog(
          `Processing in chunks of ${params.chunkSize} pages`,
          'chunking_optimization',
        );
      }
    }

    this.logger.debug(
      `[PerformanceOptimizer] ${pageCount} pages -> ` +
        `workers ${params.workers}, ${params.resolution} DPI, ` +
        `preprocess ${params.preprocess}, chunk ${params.chunkSize}`,
    );
    return params;
  }

  static averagePageSize(characteristics: DocumentCharacteristics): number {
    return (
      characteristics.fileSizeBytes / Math.max(1, characteristics.pageCount)
    );
  }

  static workers(
    pageCount: number,
    avgPageSize: number,
    isScanned: boolean,
    base: number,
  ): number {
    let workers = base;
    if (pageCount < OPTIMIZER.SMALL_DOCUMENT_PAGES) {
      workers = Math.min(OPTIMIZER.SMALL_DOCUMENT_MAX_WORKERS, base);
    } else if (pageCount > OPTIMIZER.LARGE_DOCUMENT_PAGES) {
      workers = Math.min(
        base + OPTIMIZER.LARGE_DOCUMENT_EXTRA_WORKERS,
        OPTIMIZER.MAX_WORKERS,
      );
    }

    // OCR is CPU bound
    if (isScanned) {
      workers = Math.max(
        workers,
        Math.min(
          base + OPTIMIZER.SCANNED_EXTRA_WORKERS,
          OPTIMIZER.SCANNED_MAX_WORKERS,
        ),
      );
    }

    if (avgPageSize > OPTIMIZER.HEAVY_PAGE_BYTES) {
      workers = Math.max(OPTIMIZER.HEAVY_PAGE_MIN_WORKERS, workers - 1);
    }
    return workers;
  }

  static resolution(avgPageSize: number): number {
    if (avgPageSize > OPTIMIZER.LOW_DPI_PAGE_BYTES) {
      return OPTIMIZER.LOW_DPI;
    }
    if (avgPageSize > OPTIMIZER.REDUCED_DPI_PAGE_BYTES) {
      return OPTIMIZER.REDUCED_DPI;
    }
    return OPTIMIZER.DEFAULT_DPI;
  }

  static preprocess(avgPageSize: number, isScanned: boolean): boolean {
    if (isScanned) {
      return avgPageSize <= OPTIMIZER.SCANNED_PREPROCESS_MAX_PAGE_BYTES;
    }
    return avgPageSize < OPTIMIZER.TEXT_PREPROCESS_MAX_PAGE_BYTES;
  }

  static chunkSize(pageCount: number): number {
    if (pageCount < OPTIMIZER.SINGLE_CHUNK_PAGES) {
      return Math.max(1, pageCount);
    }
    for (const [limit, size] of OPTIMIZER.CHUNK_RULES) {
      if (pageCount < limit) {
        return size;
      }
    }
    return OPTIMIZER.MAX_CHUNK_SIZE;
  }
}
