import type { LoggerMethods } from '@pdfloom/logger';
import type { ErrorRequestHandler } from 'express';

import { ExtractionError } from '@pdfloom/pdf-parser';
import multer from 'multer';

/**
 * An error that maps to a specific HTTP status.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function isMalformedBody(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * Last middleware in the chain. Client errors keep their status, anything
 * else is logged and answered with 500 and the error message only.
 */
export function createErrorHandler(
  logger: LoggerMethods,
): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    if (error instanceof HttpError) {
      res.status(error.status).json({ error: error.message });
      return;
    }
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message });
      return;
    }
    if (isMalformedBody(error)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    logger.error(`[ApiServer] ${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: ExtractionError.getErrorMessage(error) });
  };
}
