import type { LoggerMethods } from '@pdfloom/logger';

import { spawnAsync } from '@pdfloom/shared';

import { OCR } from '../config/constants';
import { PdfToolError } from '../errors/extraction-error';

/**
 * Cleans up a rendered page before OCR: grayscale, light blur to suppress
 * scan noise, then binarization.
 */
export class ImagePreprocessor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @returns Path of the preprocessed image, written beside the input
   */
  async preprocess(imagePath: string): Promise<string> {
    const outputPath = imagePath.replace(/\.png$/, '') + '.prep.png';

    const result = await spawnAsync('magick', [
      imagePath,
      '-colorspace',
      'Gray',
      '-blur',
      '0x1',
      '-threshold',
      `${OCR.THRESHOLD_PERCENT}%`,
      outputPath,
    ]);

    if (result.code !== 0) {
      throw new PdfToolError('magick', result.code, result.stderr);
    }

    this.logger.debug(`[ImagePreprocessor] Preprocessed ${imagePath}`);
    return outputPath;
  }
}
