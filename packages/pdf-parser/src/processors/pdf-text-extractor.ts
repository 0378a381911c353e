import type { LoggerMethods } from '@pdfloom/logger';

import { spawnAsync } from '@pdfloom/shared';

import { PdfToolError } from '../errors/extraction-error';

export interface PageTextOptions {
  /** Keep the physical layout (column alignment), needed for table detection */
  layout?: boolean;
}

/**
 * Extracts the text layer of single PDF pages using pdftotext.
 *
 * ## System Requirements
 * - Poppler utils (`brew install poppler` / `apt install poppler-utils`)
 */
export class PdfTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Extract text from a single page.
   *
   * @param page - 1-based page number
   * @returns Page text without the trailing form feed
   * @throws PdfToolError when pdftotext exits with an error
   */
  async extractPageText(
    pdfPath: string,
    page: number,
    options?: PageTextOptions,
  ): Promise<string> {
    const args = ['-f', page.toString(), '-l', page.toString()];
    if (options?.layout) {
      args.push('-layout');
    }
    args.push(pdfPath, '-');

    const result = await spawnAsync('pdftotext', args);

    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr || 'Unknown error'}`,
      );
      throw new PdfToolError('pdftotext', result.code, result.stderr);
    }

    return result.stdout.replace(/\f/g, '');
  }
}
