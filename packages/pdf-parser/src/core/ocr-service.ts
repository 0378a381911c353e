import type { LoggerMethods } from '@pdfloom/logger';
import type { FailedPage, PageOutcome, PageText } from '@pdfloom/model';

import { BatchProcessor, ExpiringCache, hashFile } from '@pdfloom/shared';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { OCR, PAGE_PROCESSING } from '../config/constants';
import { ExtractionError } from '../errors/extraction-error';
import { ImagePreprocessor } from '../processors/image-preprocessor';
import { OcrEngine } from '../processors/ocr-engine';
import { PageRenderer } from '../processors/page-renderer';
import { ParallelPageProcessor } from '../processors/parallel-page-processor';
import { PdfInfoReader } from '../processors/pdf-info-reader';

/** Per-call OCR options */
export interface OcrProcessOptions {
  /** Rasterization DPI (default: 300) */
  dpi?: number;
  /** Clean up page images before recognition (default: true) */
  preprocess?: boolean;
  /** Concurrent recognition workers (default: 4) */
  workers?: number;
  /** Pages rendered per batch (default: whole document) */
  chunkSize?: number;
  /** Consult and fill the OCR cache (default: true) */
  useCache?: boolean;
  /** SHA-256 of the file when the caller already computed it */
  contentHash?: string;
}

/** OCR output for a whole document */
export interface OcrDocumentResult {
  pageCount: number;
  pages: PageText[];
  failedPages: FailedPage[];
}

export interface OcrServiceOptions {
  /** Tesseract language code (default: eng) */
  language?: string;
  /** Lifetime of cached OCR results in milliseconds */
  cacheTtlMs: number;
  /** Clock for the cache (default: Date.now) */
  now?: () => number;
}

/** Collaborators, replaceable in tests */
export interface OcrServiceDeps {
  infoReader?: PdfInfoReader;
  renderer?: PageRenderer;
  preprocessor?: ImagePreprocessor;
  engine?: OcrEngine;
  pageProcessor?: ParallelPageProcessor;
}

/**
 * Runs OCR over every page of a PDF.
 *
 * Pages are rendered one chunk at a time into a private temp directory;
 * each chunk is recognized in parallel and its images are deleted before
 * the next chunk is rendered. A page that fails to render or recognize is
 * reported in `failedPages` with empty text.
 */
export class OcrService {
  private readonly logger: LoggerMethods;
  private readonly language: string;
  private readonly cache: ExpiringCache<OcrDocumentResult>;
  private readonly infoReader: PdfInfoReader;
  private readonly renderer: PageRenderer;
  private readonly preprocessor: ImagePreprocessor;
  private readonly engine: OcrEngine;
  private readonly pageProcessor: ParallelPageProcessor;

  constructor(
    logger: LoggerMethods,
    options: OcrServiceOptions,
    deps: OcrServiceDeps = {},
  ) {
    this.logger = logger;
    this.language = options.language ?? OCR.DEFAULT_LANGUAGE;
    this.cache = new ExpiringCache({
      ttlMs: options.cacheTtlMs,
      now: options.now,
    });
    this.infoReader = deps.infoReader ?? new PdfInfoReader(logger);
    this.renderer = deps.renderer ?? new PageRenderer(logger);
    this.preprocessor = deps.preprocessor ?? new ImagePreprocessor(logger);
    this.engine =
      deps.engine ?? new OcrEngine(logger, { language: this.language });
    this.pageProcessor =
      deps.pageProcessor ?? new ParallelPageProcessor(logger);
  }

  async processPdf(
    pdfPath: string,
    options: OcrProcessOptions = {},
  ): Promise<OcrDocumentResult> {
    const dpi = options.dpi ?? OCR.DEFAULT_DPI;
    const preprocess = options.preprocess ?? true;
    const useCache = options.useCache ?? true;

    let cacheKey: string | undefined;
    if (useCache) {
      const contentHash = options.contentHash ?? (await hashFile(pdfPath));
      cacheKey = `${contentHash}|${dpi}|${this.language}|${preprocess}`;
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger.info('[OcrService] Using cached OCR result');
        return cached;
      }
    }

    const { pageCount } = await this.infoReader.read(pdfPath);
    const pageNumbers = Array.from({ length: pageCount }, (_, i) => i + 1);
    const chunkSize = options.chunkSize ?? Math.max(1, pageCount);

    this.logger.info(
      `[OcrService] OCR of ${pageCount} pages at ${dpi} DPI ` +
        `(chunk ${chunkSize}, preprocess ${preprocess})`,
    );

    const workDir = await mkdtemp(join(tmpdir(), 'pdfloom-ocr-'));
    let outcomes: PageOutcome<PageText>[];
    try {
      outcomes = await BatchProcessor.processSequentially(
        pageNumbers,
        chunkSize,
        (batch, batchIndex) =>
          this.processChunk(pdfPath, workDir, batch, batchIndex, {
            dpi,
            preprocess,
            workers: options.workers ?? PAGE_PROCESSING.DEFAULT_WORKERS,
          }),
      );
    } finally {
      await this.removeDir(workDir);
    }

    const { values, failedPages } = ParallelPageProcessor.collect(
      outcomes,
      pageNumbers,
      (page) => ({ page, content: '' }),
    );
    const result: OcrDocumentResult = { pageCount, pages: values, failedPages };

    if (cacheKey !== undefined) {
      this.cache.set(cacheKey, result);
    }
    return result;
  }

  /**
   * @returns Number of cached results removed
   */
  clearCache(): number {
    return this.cache.clear();
  }

  /**
   * @returns Number of expired cached results removed
   */
  sweepCache(): number {
    return this.cache.sweep();
  }

  private async processChunk(
    pdfPath: string,
    workDir: string,
    pages: number[],
    batchIndex: number,
    options: { dpi: number; preprocess: boolean; workers: number },
  ): Promise<PageOutcome<PageText>[]> {
    const chunkDir = join(workDir, `chunk_${batchIndex}`);
    const firstPage = pages[0];
    const lastPage = pages[pages.length - 1];

    try {
      let imagePaths: Map<number, string>;
      try {
        const rendered = await this.renderer.renderPages(pdfPath, chunkDir, {
          dpi: options.dpi,
          firstPage,
          lastPage,
        });
        imagePaths = new Map(
          rendered.pages.map(({ page, imagePath }) => [page, imagePath]),
        );
      } catch (error) {
        const reason = ExtractionError.getErrorMessage(error);
        this.logger.warn(
          `[OcrService] Rendering pages ${firstPage}-${lastPage} failed: ${reason}`,
        );
        return pages.map(
          (): PageOutcome<PageText> => ({ status: 'rejected', reason }),
        );
      }

      return await this.pageProcessor.process(
        pages,
        async (page): Promise<PageText> => {
          const imagePath = imagePaths.get(page);
          if (imagePath === undefined) {
            throw new ExtractionError(`Page ${page} was not rendered`);
          }
          const input = options.preprocess
            ? await this.preprocessor.preprocess(imagePath)
            : imagePath;
          return { page, content: await this.engine.recognize(input) };
        },
        { workers: options.workers, label: 'ocr' },
      );
    } finally {
      await this.removeDir(chunkDir);
    }
  }

  private async removeDir(dir: string): Promise<void> {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(
        `[OcrService] Failed to remove ${dir}: ${ExtractionError.getErrorMessage(error)}`,
      );
    }
  }
}
