import type { LoggerMethods } from '@pdfloom/logger';
import type {
  ExtractionOptions,
  ExtractionOutcome,
  ExtractionResult,
  FailedPage,
  OptimizationParameters,
  PageText,
  StructuredPage,
} from '@pdfloom/model';

import { DEFAULT_EXTRACTION_OPTIONS } from '@pdfloom/model';
import { ExpiringCache, hashFile } from '@pdfloom/shared';
import { round } from 'es-toolkit';

import { OCR, PAGE_PROCESSING } from '../config/constants';
import { PageFailureThresholdError } from '../errors/extraction-error';
import { ParallelPageProcessor } from '../processors/parallel-page-processor';
import { PdfImageLister } from '../processors/pdf-image-lister';
import { PdfInfoReader } from '../processors/pdf-info-reader';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';
import { StructuredPageParser } from '../processors/structured-page-parser';
import { OcrService } from './ocr-service';

/** Processing parameters, usually chosen by the performance optimizer */
export type ExtractionTuning = OptimizationParameters;

export interface PdfExtractorOptions {
  /** Worker budget when no tuning is given (default: 4) */
  maxWorkers?: number;
  /** OCR language code (default: eng) */
  ocrLanguage?: string;
  /** Lifetime of cached results in milliseconds */
  cacheTtlMs: number;
  /**
   * Largest tolerated share of failed pages, 0..1 (default: 1, never fail)
   */
  maxPageFailureRatio?: number;
  /** Clock for the caches (default: Date.now) */
  now?: () => number;
}

/** Collaborators, replaceable in tests */
export interface PdfExtractorDeps {
  infoReader?: PdfInfoReader;
  textExtractor?: PdfTextExtractor;
  imageLister?: PdfImageLister;
  pageProcessor?: ParallelPageProcessor;
  ocrService?: OcrService;
}

/** Tuning with defaults applied; no chunk size means the whole document */
type ResolvedTuning = Omit<ExtractionTuning, 'chunkSize'> & {
  chunkSize?: number;
};

interface PagesResult<T> {
  content: T[];
  failedPages: FailedPage[];
}

/**
 * Extracts text, structure or OCR output from a PDF.
 *
 * Results are cached by file content and the options that shape the output,
 * so the same upload under another name is served from cache.
 */
export class PdfExtractor {
  private readonly logger: LoggerMethods;
  private readonly maxWorkers: number;
  private readonly maxPageFailureRatio: number;
  private readonly cache: ExpiringCache<ExtractionResult>;
  private readonly infoReader: PdfInfoReader;
  private readonly textExtractor: PdfTextExtractor;
  private readonly imageLister: PdfImageLister;
  private readonly pageProcessor: ParallelPageProcessor;
  private readonly ocrService: OcrService;

  constructor(
    logger: LoggerMethods,
    options: PdfExtractorOptions,
    deps: PdfExtractorDeps = {},
  ) {
    this.logger = logger;
    this.maxWorkers = options.maxWorkers ?? PAGE_PROCESSING.DEFAULT_WORKERS;
    this.maxPageFailureRatio = options.maxPageFailureRatio ?? 1;
    this.cache = new ExpiringCache({
      ttlMs: options.cacheTtlMs,
      now: options.now,
    });
    this.infoReader = deps.infoReader ?? new PdfInfoReader(logger);
    this.textExtractor = deps.textExtractor ?? new PdfTextExtractor(logger);
    this.imageLister = deps.imageLister ?? new PdfImageLister(logger);
    this.pageProcessor =
      deps.pageProcessor ?? new ParallelPageProcessor(logger);
    this.ocrService =
      deps.ocrService ??
      new OcrService(logger, {
        language: options.ocrLanguage,
        cacheTtlMs: options.cacheTtlMs,
        now: options.now,
      });
  }

  async extract(
    pdfPath: string,
    options: Partial<ExtractionOptions> = {},
    tuning: Partial<ExtractionTuning> = {},
  ): Promise<ExtractionOutcome> {
    const startTime = Date.now();
    const opts: ExtractionOptions = {
      ...DEFAULT_EXTRACTION_OPTIONS,
      ...options,
    };
    const params: ResolvedTuning = {
      workers: tuning.workers ?? this.maxWorkers,
      resolution: tuning.resolution ?? OCR.DEFAULT_DPI,
      preprocess: tuning.preprocess ?? true,
      chunkSize: tuning.chunkSize,
    };

    let contentHash: string | undefined;
    let cacheKey: string | undefined;
    if (opts.useCache) {
      contentHash = await hashFile(pdfPath);
      cacheKey = [
        contentHash,
        opts.extractionType,
        opts.includeImages,
        opts.includeMetadata,
        opts.fastMode,
      ].join('|');

      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger.info('[PdfExtractor] Using cached extraction result');
        return {
          status: 'success',
          content: cached,
          executionTime: this.elapsedSeconds(startTime),
          cacheHit: true,
        };
      }
    }

    this.logger.info(
      `[PdfExtractor] Extracting ${opts.extractionType} from ${pdfPath} ` +
        `(workers ${params.workers}, fast ${opts.fastMode})`,
    );

    const result = await this.extractByType(pdfPath, opts, params, contentHash);
    this.assertFailureRatio(result.failedPages.length, result.pages);

    if (cacheKey !== undefined) {
      this.cache.set(cacheKey, result);
    }

    return {
      status: 'success',
      content: result,
      executionTime: this.elapsedSeconds(startTime),
      cacheHit: false,
    };
  }

  /**
   * Clears the extraction and OCR caches.
   *
   * @returns Number of entries removed
   */
  clearCaches(): number {
    return this.cache.clear() + this.ocrService.clearCache();
  }

  /**
   * Drops expired entries from the extraction and OCR caches.
   *
   * @returns Number of entries removed
   */
  sweepCaches(): number {
    return this.cache.sweep() + this.ocrService.sweepCache();
  }

  private async extractByType(
    pdfPath: string,
    opts: ExtractionOptions,
    params: ResolvedTuning,
    contentHash: string | undefined,
  ): Promise<ExtractionResult> {
    if (opts.extractionType === 'ocr') {
      const ocr = await this.ocrService.processPdf(pdfPath, {
        dpi: opts.fastMode ? OCR.FAST_MODE_DPI : params.resolution,
        preprocess: opts.fastMode ? false : params.preprocess,
        workers: params.workers,
        chunkSize: params.chunkSize,
        useCache: opts.useCache,
        contentHash,
      });
      return {
        type: 'ocr',
        pages: ocr.pageCount,
        content: ocr.pages,
        failedPages: ocr.failedPages,
      };
    }

    const { pageCount, metadata } = await this.infoReader.read(pdfPath);

    let result: ExtractionResult;
    if (opts.extractionType === 'structured') {
      const { content, failedPages } = await this.extractStructured(
        pdfPath,
        pageCount,
        opts,
        params,
      );
      result = { type: 'structured', pages: pageCount, content, failedPages };
    } else {
      const { content, failedPages } = await this.extractText(
        pdfPath,
        pageCount,
        opts,
        params,
      );
      result = { type: 'text', pages: pageCount, content, failedPages };
    }

    if (opts.includeMetadata) {
      result.metadata = metadata;
    }
    if (opts.includeImages) {
      result.images = await this.imageLister.list(pdfPath);
    }
    return result;
  }

  private async extractText(
    pdfPath: string,
    pageCount: number,
    opts: ExtractionOptions,
    params: ResolvedTuning,
  ): Promise<PagesResult<PageText>> {
    const pages = pageNumbers(pageCount);
    const outcomes = await this.pageProcessor.process(
      pages,
      async (page): Promise<PageText> => ({
        page,
        content: await this.textExtractor.extractPageText(pdfPath, page),
      }),
      {
        workers: params.workers,
        sequentialThreshold: PAGE_PROCESSING.TEXT_SEQUENTIAL_THRESHOLD,
        fastMode: opts.fastMode,
        label: 'text',
      },
    );

    const { values, failedPages } = ParallelPageProcessor.collect(
      outcomes,
      pages,
      (page) => ({ page, content: '' }),
    );
    return { content: values, failedPages };
  }

  private async extractStructured(
    pdfPath: string,
    pageCount: number,
    opts: ExtractionOptions,
    params: ResolvedTuning,
  ): Promise<PagesResult<StructuredPage>> {
    const pages = pageNumbers(pageCount);
    const outcomes = await this.pageProcessor.process(
      pages,
      async (page) =>
        StructuredPageParser.parse(
          page,
          await this.textExtractor.extractPageText(pdfPath, page, {
            layout: true,
          }),
        ),
      {
        workers: params.workers,
        sequentialThreshold: PAGE_PROCESSING.STRUCTURED_SEQUENTIAL_THRESHOLD,
        fastMode: opts.fastMode,
        label: 'structured',
      },
    );

    const { values, failedPages } = ParallelPageProcessor.collect(
      outcomes,
      pages,
      (page) => ({ page, elements: [], tables: [], rawText: '' }),
    );
    return { content: values, failedPages };
  }

  private assertFailureRatio(failedCount: number, totalCount: number): void {
    if (totalCount === 0 || failedCount === 0) {
      return;
    }
    if (failedCount / totalCount > this.maxPageFailureRatio) {
      throw new PageFailureThresholdError(
        failedCount,
        totalCount,
        this.maxPageFailureRatio,
      );
    }
    this.logger.warn(
      `[PdfExtractor] ${failedCount} of ${totalCount} pages failed`,
    );
  }

  private elapsedSeconds(startTime: number): number {
    return round((Date.now() - startTime) / 1000, 2);
  }
}

function pageNumbers(pageCount: number): number[] {
  return Array.from({ length: pageCount }, (_, i) => i + 1);
}
