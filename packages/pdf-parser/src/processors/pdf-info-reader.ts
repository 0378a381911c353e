import type { LoggerMethods } from '@pdfloom/logger';

import { spawnAsync } from '@pdfloom/shared';

import { PdfToolError } from '../errors/extraction-error';

/** Parsed pdfinfo output */
export interface PdfInfo {
  pageCount: number;
  /** Every `Key: value` line reported by pdfinfo */
  metadata: Record<string, string>;
}

const INFO_LINE = /^([^:]+):\s*(.*)$/;

/**
 * Reads page count and document metadata using pdfinfo.
 *
 * ## System Requirements
 * - Poppler utils (`brew install poppler` / `apt install poppler-utils`)
 */
export class PdfInfoReader {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @throws PdfToolError when pdfinfo cannot read the file
   */
  async read(pdfPath: string): Promise<PdfInfo> {
    const result = await spawnAsync('pdfinfo', [pdfPath]);
    if (result.code !== 0) {
      throw new PdfToolError('pdfinfo', result.code, result.stderr);
    }

    const info = PdfInfoReader.parse(result.stdout);
    this.logger.debug(`[PdfInfoReader] ${pdfPath}: ${info.pageCount} pages`);
    return info;
  }

  static parse(output: string): PdfInfo {
    const metadata: Record<string, string> = {};
    for (const line of output.split('\n')) {
      const match = line.match(INFO_LINE);
      if (match) {
        metadata[match[1].trim()] = match[2].trim();
      }
    }

    const pages = parseInt(metadata['Pages'] ?? '', 10);
    return {
      pageCount: Number.isNaN(pages) ? 0 : pages,
      metadata,
    };
  }
}
