import type { LoggerMethods } from '@pdfloom/logger';
import type { ImageInfo } from '@pdfloom/model';

import { spawnAsync } from '@pdfloom/shared';

import { PdfToolError } from '../errors/extraction-error';

/** Rows whose type column is one of these are masks, not images */
const IMAGE_TYPE = 'image';

/**
 * Lists embedded raster images using `pdfimages -list`.
 * Only image metadata is reported; no image data is extracted.
 *
 * ## System Requirements
 * - Poppler utils (`brew install poppler` / `apt install poppler-utils`)
 */
export class PdfImageLister {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @param firstPage - 1-based first page (default: 1)
   * @param lastPage - 1-based last page (default: last page of the document)
   */
  async list(
    pdfPath: string,
    firstPage?: number,
    lastPage?: number,
  ): Promise<ImageInfo[]> {
    const args = ['-list'];
    if (firstPage !== undefined) {
      args.push('-f', firstPage.toString());
    }
    if (lastPage !== undefined) {
      args.push('-l', lastPage.toString());
    }
    args.push(pdfPath);

    const result = await spawnAsync('pdfimages', args);
    if (result.code !== 0) {
      throw new PdfToolError('pdfimages', result.code, result.stderr);
    }

    const images = PdfImageLister.parse(result.stdout);
    this.logger.debug(`[PdfImageLister] Found ${images.length} images`);
    return images;
  }

  /**
   * Parse the table printed by `pdfimages -list`:
   *
   * ```
   * page   num  type   width height color comp bpc  enc ...
   * --------------------------------------------------------
   *    1     0 image    1700  2200  gray    1   8  jpeg ...
   * ```
   */
  static parse(output: string): ImageInfo[] {
    const lines = output.split('\n');
    const separator = lines.findIndex((line) => line.startsWith('---'));
    const perPageIndex = new Map<number, number>();
    const images: ImageInfo[] = [];

    for (const line of lines.slice(separator + 1)) {
      const columns = line.trim().split(/\s+/);
      if (columns.length < 5 || columns[2] !== IMAGE_TYPE) {
        continue;
      }

      const page = parseInt(columns[0], 10);
      const width = parseInt(columns[3], 10);
      const height = parseInt(columns[4], 10);
      if ([page, width, height].some(Number.isNaN)) {
        continue;
      }

      const index = perPageIndex.get(page) ?? 0;
      perPageIndex.set(page, index + 1);
      images.push({ page, index, width, height, type: 'image' });
    }

    return images;
  }
}
