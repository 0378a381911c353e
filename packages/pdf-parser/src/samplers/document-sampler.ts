import type { LoggerMethods } from '@pdfloom/logger';
import type { DocumentCharacteristics } from '@pdfloom/model';

import { stat } from 'node:fs/promises';

import { SAMPLING } from '../config/constants';
import { PdfImageLister } from '../processors/pdf-image-lister';
import { PdfInfoReader } from '../processors/pdf-info-reader';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';
import { StructuredPageParser } from '../processors/structured-page-parser';

/** Result of sampling a document */
export interface DocumentSample {
  characteristics: DocumentCharacteristics;
  /** Text layer of page 1, empty for a 0-page document */
  firstPageText: string;
}

/**
 * Derives document characteristics from the first few pages of a PDF.
 *
 * Sampling strategy:
 * - Page count from pdfinfo, file size from the file system
 * - Text layer and embedded images of at most the first 3 pages
 * - A document counts as scanned when it has images and page 1 carries
 *   less than 100 characters of text
 */
export class DocumentSampler {
  private readonly logger: LoggerMethods;
  private readonly infoReader: PdfInfoReader;
  private readonly textExtractor: PdfTextExtractor;
  private readonly imageLister: PdfImageLister;

  constructor(
    logger: LoggerMethods,
    infoReader?: PdfInfoReader,
    textExtractor?: PdfTextExtractor,
    imageLister?: PdfImageLister,
  ) {
    this.logger = logger;
    this.infoReader = infoReader ?? new PdfInfoReader(logger);
    this.textExtractor = textExtractor ?? new PdfTextExtractor(logger);
    this.imageLister = imageLister ?? new PdfImageLister(logger);
  }

  async sample(pdfPath: string): Promise<DocumentSample> {
    const [{ pageCount }, { size: fileSizeBytes }] = await Promise.all([
      this.infoReader.read(pdfPath),
      stat(pdfPath),
    ]);

    const samplePages = Math.min(SAMPLING.MAX_SAMPLE_PAGES, pageCount);
    if (samplePages === 0) {
      this.logger.info('[DocumentSampler] No pages found in PDF');
      return {
        characteristics: {
          pageCount,
          fileSizeBytes,
          hasImages: false,
          hasTables: false,
          isScanned: false,
        },
        firstPageText: '',
      };
    }

    const texts: string[] = [];
    for (let page = 1; page <= samplePages; page++) {
      texts.push(
        await this.textExtractor.extractPageText(pdfPath, page, {
          layout: true,
        }),
      );
    }
    // Layout mode pads columns with spaces; the scanned check reads plain text
    const firstPageText = await this.textExtractor.extractPageText(pdfPath, 1);
    const images = await this.imageLister.list(pdfPath, 1, samplePages);

    const hasImages = images.length > 0;
    const hasTables = texts.some(
      (text) => StructuredPageParser.parseTables(text).length > 0,
    );
    const isScanned =
      hasImages &&
      firstPageText.trim().length < SAMPLING.SCANNED_TEXT_MIN_CHARS;

    this.logger.info(
      `[DocumentSampler] Sampled ${samplePages} of ${pageCount} pages: ` +
        `images=${hasImages}, tables=${hasTables}, scanned=${isScanned}`,
    );

    return {
      characteristics: {
        pageCount,
        fileSizeBytes,
        hasImages,
        hasTables,
        isScanned,
      },
      firstPageText,
    };
  }
}
