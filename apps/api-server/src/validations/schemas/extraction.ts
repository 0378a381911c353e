import { z } from 'zod';

/**
 * Boolean sent as JSON or as a multipart form string ("true", "false", ...)
 */
export const formBooleanSchema = z.union([z.boolean(), z.stringbool()]);

/**
 * Extraction options shared by every extraction endpoint.
 */
export const extractionOptionsSchema = z.object({
  extractionType: z.enum(['text', 'structured', 'ocr']).default('text'),
  includeImages: formBooleanSchema.default(false),
  includeMetadata: formBooleanSchema.default(false),
  fastMode: formBooleanSchema.default(false),
  useCache: formBooleanSchema.default(true),
});

/**
 * Remote PDF location, http(s) only
 */
export const pdfUrlSchema = z.url({
  protocol: /^https?$/,
  message: 'pdfUrl must be an http(s) URL',
});

/**
 * POST /extract-optimized: a file upload or a `pdfUrl`, plus options.
 */
export const extractOptimizedBodySchema = extractionOptionsSchema.extend({
  pdfUrl: pdfUrlSchema.optional(),
});

/**
 * POST /extract-url request body
 */
export const extractUrlBodySchema = extractionOptionsSchema.extend({
  pdfUrl: pdfUrlSchema,
});

export type ExtractionOptionsInput = z.infer<typeof extractionOptionsSchema>;
export type ExtractOptimizedBody = z.infer<typeof extractOptimizedBodySchema>;
export type ExtractUrlBody = z.infer<typeof extractUrlBodySchema>;
