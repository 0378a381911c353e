import type { LoggerMethods } from '@pdfloom/logger';

import { spawnAsync } from '@pdfloom/shared';

import { OCR } from '../config/constants';
import { ExtractionError, PdfToolError } from '../errors/extraction-error';

export interface OcrEngineOptions {
  /** Tesseract language code (default: eng) */
  language?: string;
  /** Per-image timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Recognizes text in a page image with Tesseract.
 *
 * ## System Requirements
 * - Tesseract (`brew install tesseract` / `apt install tesseract-ocr`)
 */
export class OcrEngine {
  readonly language: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly logger: LoggerMethods,
    options?: OcrEngineOptions,
  ) {
    this.language = options?.language ?? OCR.DEFAULT_LANGUAGE;
    this.timeoutMs = options?.timeoutMs ?? OCR.PAGE_TIMEOUT_MS;
  }

  async recognize(imagePath: string): Promise<string> {
    const result = await spawnAsync(
      'tesseract',
      [imagePath, 'stdout', '-l', this.language],
      { timeoutMs: this.timeoutMs },
    );

    if (result.timedOut) {
      throw new ExtractionError(
        `tesseract timed out after ${this.timeoutMs}ms on ${imagePath}`,
      );
    }
    if (result.code !== 0) {
      throw new PdfToolError('tesseract', result.code, result.stderr);
    }

    this.logger.debug(`[OcrEngine] Recognized ${imagePath}`);
    return result.stdout;
  }
}
