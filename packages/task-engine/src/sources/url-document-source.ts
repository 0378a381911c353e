import type { LoggerMethods } from '@pdfloom/logger';

import type { DownloadCache } from './download-cache';
import type { DocumentSource, ResolvedDocument } from './document-source';

import { ExtractionError } from '@pdfloom/pdf-parser';
import { randomUUID } from 'node:crypto';
import { copyFile, link, open, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { DOWNLOAD } from '../config/constants';
import { DownloadError } from '../errors/task-errors';

export interface UrlDocumentSourceOptions {
  /** Directory downloads are written to */
  downloadDir: string;
  /** Shared download cache */
  cache: DownloadCache;
  /** Reuse and fill the download cache (default: true) */
  useCache?: boolean;
  /** Request timeout in milliseconds (default: 30 000) */
  timeoutMs?: number;
  /** Fetch implementation (default: global fetch) */
  fetchFn?: typeof fetch;
}

/**
 * A remote PDF, downloaded before extraction.
 *
 * With caching on, the downloaded file is handed to the download cache and
 * outlives the task. Every task works on its own hard link of the cached
 * file, so eviction never removes a file a task still reads; release deletes
 * only that link. Without caching the task deletes the download on release.
 */
export class UrlDocumentSource implements DocumentSource {
  readonly description: string;
  private readonly useCache: boolean;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly url: string,
    private readonly options: UrlDocumentSourceOptions,
    private readonly logger: LoggerMethods,
  ) {
    this.description = url;
    this.useCache = options.useCache ?? true;
    this.timeoutMs = options.timeoutMs ?? DOWNLOAD.TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async resolve(): Promise<ResolvedDocument> {
    if (this.useCache) {
      const cachedPath = this.options.cache.get(this.url);
      if (cachedPath !== undefined) {
        try {
          const document = await this.hold(cachedPath);
          this.logger.info(
            `[UrlDocumentSource] Using cached download of ${this.url}`,
          );
          return document;
        } catch (error) {
          this.logger.warn(
            `[UrlDocumentSource] Cached download of ${this.url} is gone, downloading again: ${ExtractionError.getErrorMessage(error)}`,
          );
        }
      }
    }

    const path = await this.download();
    if (!this.useCache) {
      return { path, release: () => rm(path, { force: true }) };
    }

    const document = await this.hold(path);
    if (this.options.cache.has(this.url)) {
      // Another task cached the same URL meanwhile; its file stays
      await rm(path, { force: true });
    } else {
      this.options.cache.set(this.url, path);
    }
    return document;
  }

  /**
   * Give the task a private name for a cached file.
   */
  private async hold(cachedPath: string): Promise<ResolvedDocument> {
    const path = this.nextPath();
    try {
      await link(cachedPath, path);
    } catch {
      // Hard links fail across devices and on some filesystems
      await copyFile(cachedPath, path);
    }
    return { path, release: () => rm(path, { force: true }) };
  }

  private async download(): Promise<string> {
    this.logger.info(`[UrlDocumentSource] Downloading ${this.url}`);

    let response: Response;
    try {
      response = await this.fetchFn(this.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw this.toDownloadError(error);
    }

    if (!response.ok) {
      throw new DownloadError(
        `Failed to download PDF: HTTP ${response.status}`,
        this.url,
        { statusCode: response.status },
      );
    }

    const body = response.body;
    if (body === null) {
      throw new DownloadError(
        'Failed to download PDF: empty response body',
        this.url,
        { statusCode: response.status },
      );
    }

    const path = this.nextPath();
    const file = await open(path, 'w');
    try {
      await pipeline(Readable.fromWeb(body), file.createWriteStream());
    } catch (error) {
      await rm(path, { force: true });
      throw this.toDownloadError(error);
    }

    const { size } = await stat(path);
    this.logger.info(
      `[UrlDocumentSource] Downloaded ${size} bytes to ${path}`,
    );
    return path;
  }

  private nextPath(): string {
    return join(
      this.options.downloadDir,
      `${DOWNLOAD.FILE_PREFIX}${randomUUID()}.pdf`,
    );
  }

  private toDownloadError(error: unknown): DownloadError {
    if (isTimeout(error)) {
      return new DownloadError(
        `Download timed out after ${this.timeoutMs}ms`,
        this.url,
        { cause: error },
      );
    }
    return new DownloadError(
      `Failed to download PDF: ${ExtractionError.getErrorMessage(error)}`,
      this.url,
      { cause: error },
    );
  }
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'TimeoutError'
  );
}
