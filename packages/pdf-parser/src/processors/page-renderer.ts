import type { LoggerMethods } from '@pdfloom/logger';

import { spawnAsync } from '@pdfloom/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { OCR } from '../config/constants';
import { PdfToolError } from '../errors/extraction-error';

/** A rendered page image */
export interface RenderedPage {
  /** 1-based page number */
  page: number;
  /** Absolute path to the PNG file */
  imagePath: string;
}

/** Result of page rendering */
export interface PageRenderResult {
  /** Absolute path to the pages directory */
  pagesDir: string;
  /** Rendered pages in page order */
  pages: RenderedPage[];
}

/** Options for page rendering */
export interface PageRendererOptions {
  /** DPI for rendered images (default: 300) */
  dpi?: number;
  /** 1-based first page to render (default: 1) */
  firstPage?: number;
  /** 1-based last page to render (default: last page) */
  lastPage?: number;
}

const PAGE_FILE_PATTERN = /^page_(\d+)\.png$/;

/**
 * Renders PDF pages to individual PNG images using ImageMagick.
 *
 * Files are named `page_N.png` with N the 1-based page number, so a range
 * rendered into an existing directory never collides with earlier chunks.
 *
 * ## System Requirements
 * - ImageMagick (`brew install imagemagick`)
 * - Ghostscript (`brew install ghostscript`)
 */
export class PageRenderer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Render a range of pages (or the whole document) to PNG files.
   *
   * @param outputDir - Directory where the pages/ subdirectory will be created
   */
  async renderPages(
    pdfPath: string,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<PageRenderResult> {
    const dpi = options?.dpi ?? OCR.DEFAULT_DPI;
    const firstPage = options?.firstPage ?? 1;
    const lastPage = options?.lastPage;
    const pagesDir = join(outputDir, 'pages');

    if (!existsSync(pagesDir)) {
      mkdirSync(pagesDir, { recursive: true });
    }

    // ImageMagick frame selectors are 0-based
    const frames =
      lastPage !== undefined
        ? `[${firstPage - 1}-${lastPage - 1}]`
        : firstPage > 1
          ? `[${firstPage - 1}--1]`
          : '';

    this.logger.debug(
      `[PageRenderer] Rendering pages ${firstPage}-${lastPage ?? 'end'} at ${dpi} DPI...`,
    );

    const result = await spawnAsync('magick', [
      '-density',
      dpi.toString(),
      `${pdfPath}${frames}`,
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      '-scene',
      firstPage.toString(),
      join(pagesDir, 'page_%d.png'),
    ]);

    if (result.code !== 0) {
      throw new PdfToolError('magick', result.code, result.stderr);
    }

    const pages = readdirSync(pagesDir)
      .flatMap((file): RenderedPage[] => {
        const match = PAGE_FILE_PATTERN.exec(file);
        if (!match) {
          return [];
        }
        const page = parseInt(match[1], 10);
        const inRange =
          page >= firstPage && (lastPage === undefined || page <= lastPage);
        return inRange ? [{ page, imagePath: join(pagesDir, file) }] : [];
      })
      .sort((a, b) => a.page - b.page);

    this.logger.debug(
      `[PageRenderer] Rendered ${pages.length} pages to ${pagesDir}`,
    );

    return { pagesDir, pages };
  }
}
