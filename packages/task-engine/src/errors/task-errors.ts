import { ExtractionError } from '@pdfloom/pdf-parser';

/**
 * DuplicateTaskError
 *
 * A task was created under an id the registry already holds.
 */
export class DuplicateTaskError extends ExtractionError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task already exists: ${taskId}`);
    this.name = 'DuplicateTaskError';
    this.taskId = taskId;
  }
}

/**
 * DownloadError
 *
 * A remote document could not be fetched (HTTP error, network failure or
 * timeout).
 */
export class DownloadError extends ExtractionError {
  readonly url: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    url: string,
    options?: ErrorOptions & { statusCode?: number },
  ) {
    super(message, options);
    this.name = 'DownloadError';
    this.url = url;
    this.statusCode = options?.statusCode;
  }
}
