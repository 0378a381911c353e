import multer from 'multer';
import { randomUUID } from 'node:crypto';

import { HttpError } from './error-handler';

export const UPLOAD_FILE_PREFIX = 'upload_';

export function isPdfUpload(file: {
  mimetype: string;
  originalname: string;
}): boolean {
  return (
    file.mimetype === 'application/pdf' ||
    file.originalname.toLowerCase().endsWith('.pdf')
  );
}

/**
 * Multer instance that stores a single PDF upload under `uploadDir`.
 * Anything that is not a PDF is rejected with 400.
 */
export function createPdfUpload(
  uploadDir: string,
  maxUploadBytes: number,
): multer.Multer {
  return multer({
    storage: multer.diskStorage({
      destination: uploadDir,
      filename: (_req, _file, cb) => {
        cb(null, `${UPLOAD_FILE_PREFIX}${randomUUID()}.pdf`);
      },
    }),
    fileFilter: (_req, file, cb) => {
      if (isPdfUpload(file)) {
        cb(null, true);
      } else {
        cb(new HttpError(400, 'Only PDF files are allowed'));
      }
    },
    limits: { fileSize: maxUploadBytes, files: 1 },
  });
}
