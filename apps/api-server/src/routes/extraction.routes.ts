import type { DocumentSource } from '@pdfloom/task-engine';

import type { AppDeps } from '../types';

import { FileDocumentSource } from '@pdfloom/task-engine';
import { Router } from 'express';
import { rm } from 'node:fs/promises';

import { asyncHandler } from '../middleware/async-handler';
import { createPdfUpload } from '../middleware/pdf-upload';
import {
  extractOptimizedBodySchema,
  extractUrlBodySchema,
  extractionOptionsSchema,
  parseRequestBody,
  sendValidationError,
} from '../validations';

async function discardUpload(file: Express.Multer.File | undefined) {
  if (file) {
    await rm(file.path, { force: true });
  }
}

export function createExtractionRouter(deps: AppDeps): Router {
  const router = Router();
  const upload = createPdfUpload(deps.uploadDir, deps.maxUploadBytes);

  /**
   * Submit an extraction task; poll /task-progress for its state.
   * An uploaded file takes precedence over `pdfUrl`.
   */
  router.post(
    '/extract-optimized',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const parsed = parseRequestBody(req.body, extractOptimizedBodySchema);
      if (!parsed.success) {
        await discardUpload(req.file);
        sendValidationError(res, parsed.error);
        return;
      }

      const { pdfUrl, ...options } = parsed.data;
      let source: DocumentSource;
      if (req.file) {
        source = new FileDocumentSource(req.file.path, req.file.originalname);
      } else if (pdfUrl !== undefined) {
        source = deps.createUrlSource(pdfUrl, options.useCache);
      } else {
        res
          .status(400)
          .json({ error: 'Either a PDF file or pdfUrl is required' });
        return;
      }

      const { taskId } = deps.submissions.submit(source, options);
      res.json({ status: 'processing', taskId });
    }),
  );

  router.post(
    '/extract',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) {
        res.status(400).json({ error: 'No PDF file uploaded' });
        return;
      }

      try {
        const parsed = parseRequestBody(req.body, extractionOptionsSchema);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }
        res.json(await deps.extractor.extract(file.path, parsed.data));
      } finally {
        await discardUpload(file);
      }
    }),
  );

  router.post(
    '/extract-url',
    asyncHandler(async (req, res) => {
      const parsed = parseRequestBody(req.body, extractUrlBodySchema);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }

      const { pdfUrl, ...options } = parsed.data;
      const document = await deps
        .createUrlSource(pdfUrl, options.useCache)
        .resolve();
      try {
        res.json(await deps.extractor.extract(document.path, options));
      } finally {
        await document.release();
      }
    }),
  );

  router.post('/clear-cache', (_req, res) => {
    const cleared = deps.extractor.clearCaches() + deps.downloadCache.clear();
    deps.logger.info(`[ApiServer] Cleared ${cleared} cache entries`);
    res.json({
      status: 'success',
      message: `Cache cleared (${cleared} entries)`,
    });
  });

  return router;
}
