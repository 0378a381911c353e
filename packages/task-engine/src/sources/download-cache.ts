import type { LoggerMethods } from '@pdfloom/logger';

import { ExtractionError } from '@pdfloom/pdf-parser';
import { ExpiringCache } from '@pdfloom/shared';
import { existsSync, rmSync } from 'node:fs';

/** URL -> path of the downloaded temp file */
export type DownloadCache = ExpiringCache<string>;

/**
 * Cache of downloaded documents. It owns the files it holds: an entry whose
 * file has disappeared is dropped, and an evicted entry's file is deleted.
 */
export function createDownloadCache(
  logger: LoggerMethods,
  ttlMs: number,
  now?: () => number,
): DownloadCache {
  return new ExpiringCache<string>({
    ttlMs,
    now,
    isValid: (path) => existsSync(path),
    onEvict: (path, url) => {
      try {
        rmSync(path, { force: true });
        logger.debug(`[DownloadCache] Evicted ${url}`);
      } catch (error) {
        logger.warn(
          `[DownloadCache] Failed to delete ${path}: ${ExtractionError.getErrorMessage(error)}`,
        );
      }
    },
  });
}
