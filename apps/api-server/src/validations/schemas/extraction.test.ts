import { describe, expect, test } from 'vitest';

import { parseRequestBody } from '../helpers/validate';
import { toValidationErrorResponse } from '../helpers/error-response';
import {
  extractOptimizedBodySchema,
  extractUrlBodySchema,
  extractionOptionsSchema,
} from './extraction';

describe('extractionOptionsSchema', () => {
  test('fills defaults', () => {
    expect(extractionOptionsSchema.parse({})).toEqual({
      extractionType: 'text',
      includeImages: false,
      includeMetadata: false,
      fastMode: false,
      useCache: true,
    });
  });

  test('accepts form strings and JSON booleans', () => {
    expect(
      extractionOptionsSchema.parse({
        extractionType: 'ocr',
        includeImages: 'true',
        includeMetadata: true,
        fastMode: 'false',
        useCache: 'false',
      }),
    ).toEqual({
      extractionType: 'ocr',
      includeImages: true,
      includeMetadata: true,
      fastMode: false,
      useCache: false,
    });
  });

  test('rejects an unknown extraction type', () => {
    const result = extractionOptionsSchema.safeParse({
      extractionType: 'html',
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['extractionType']);
  });

  test('rejects a non-boolean flag', () => {
    const result = extractionOptionsSchema.safeParse({ fastMode: 'maybe' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['fastMode']);
  });
});

describe('extractOptimizedBodySchema', () => {
  test('pdfUrl is optional', () => {
    expect(extractOptimizedBodySchema.parse({}).pdfUrl).toBeUndefined();
  });

  test('rejects a non-http URL', () => {
    const result = extractOptimizedBodySchema.safeParse({
      pdfUrl: 'ftp://example.com/doc.pdf',
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe(
      'pdfUrl must be an http(s) URL',
    );
  });
});

describe('extractUrlBodySchema', () => {
  test('requires pdfUrl', () => {
    const result = extractUrlBodySchema.safeParse({});

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['pdfUrl']);
  });

  test('accepts an https URL', () => {
    expect(
      extractUrlBodySchema.parse({ pdfUrl: 'https://example.com/a.pdf' })
        .pdfUrl,
    ).toBe('https://example.com/a.pdf');
  });
});

describe('parseRequestBody', () => {
  test('treats a missing body as empty', () => {
    const result = parseRequestBody(undefined, extractionOptionsSchema);

    expect(result.success).toBe(true);
    expect(result.success && result.data.extractionType).toBe('text');
  });

  test('returns the zod error on failure', () => {
    const result = parseRequestBody(
      { extractionType: 'html' },
      extractionOptionsSchema,
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      const body = toValidationErrorResponse(result.error);
      expect(body.error).toBe('Validation failed');
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.details).toHaveLength(1);
      expect(body.details[0]?.path).toBe('extractionType');
    }
  });
});
