import { stat } from 'node:fs/promises';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import type { PdfImageLister } from '../processors/pdf-image-lister';
import type { PdfInfoReader } from '../processors/pdf-info-reader';
import type { PdfTextExtractor } from '../processors/pdf-text-extractor';

import { DocumentSampler } from './document-sampler';

vi.mock('node:fs/promises', () => ({
  stat: vi.fn(),
}));

const mockStat = stat as Mock;

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const LONG_TEXT = 'This page has a real text layer with plenty of words. '.repeat(3);

describe('DocumentSampler', () => {
  const read = vi.fn();
  const extractPageText = vi.fn();
  const list = vi.fn();
  let sampler: DocumentSampler;

  beforeEach(() => {
    vi.clearAllMocks();
    mockStat.mockResolvedValue({ size: 2048 });
    list.mockResolvedValue([]);
    extractPageText.mockResolvedValue(LONG_TEXT);
    sampler = new DocumentSampler(
      mockLogger,
      { read } as unknown as PdfInfoReader,
      { extractPageText } as unknown as PdfTextExtractor,
      { list } as unknown as PdfImageLister,
    );
  });

  test('samples at most the first 3 pages', async () => {
    read.mockResolvedValue({ pageCount: 10, metadata: {} });

    const result = await sampler.sample('/tmp/doc.pdf');

    expect(extractPageText).toHaveBeenCalledTimes(4);
    expect(extractPageText).toHaveBeenNthCalledWith(3, '/tmp/doc.pdf', 3, {
      layout: true,
    });
    expect(extractPageText).toHaveBeenNthCalledWith(4, '/tmp/doc.pdf', 1);
    expect(list).toHaveBeenCalledWith('/tmp/doc.pdf', 1, 3);
    expect(result).toEqual({
      characteristics: {
        pageCount: 10,
        fileSizeBytes: 2048,
        hasImages: false,
        hasTables: false,
        isScanned: false,
      },
      firstPageText: LONG_TEXT,
    });
  });

  test('samples only existing pages of a short document', async () => {
    read.mockResolvedValue({ pageCount: 2, metadata: {} });

    await sampler.sample('/tmp/doc.pdf');

    expect(extractPageText).toHaveBeenCalledTimes(3);
    expect(list).toHaveBeenCalledWith('/tmp/doc.pdf', 1, 2);
  });

  test('flags images with little first-page text as scanned', async () => {
    read.mockResolvedValue({ pageCount: 60, metadata: {} });
    extractPageText.mockResolvedValue('  \n');
    list.mockResolvedValue([
      { page: 1, index: 0, width: 2480, height: 3508, type: 'image' },
    ]);

    const { characteristics } = await sampler.sample('/tmp/scan.pdf');

    expect(characteristics.hasImages).toBe(true);
    expect(characteristics.isScanned).toBe(true);
  });

  test('measures first-page text without layout padding', async () => {
    read.mockResolvedValue({ pageCount: 1, metadata: {} });
    extractPageText.mockImplementation(
      async (_path: string, _page: number, options?: { layout?: boolean }) =>
        options?.layout
          ? `APPROVED${' '.repeat(120)}Page 1\n`
          : 'APPROVED\n\nPage 1\n',
    );
    list.mockResolvedValue([
      { page: 1, index: 0, width: 2480, height: 3508, type: 'image' },
    ]);

    const result = await sampler.sample('/tmp/scan.pdf');

    expect(result.characteristics.isScanned).toBe(true);
    expect(result.firstPageText).toBe('APPROVED\n\nPage 1\n');
  });

  test('images alongside a real text layer are not scanned', async () => {
    read.mockResolvedValue({ pageCount: 4, metadata: {} });
    list.mockResolvedValue([
      { page: 2, index: 0, width: 300, height: 200, type: 'image' },
    ]);

    const { characteristics } = await sampler.sample('/tmp/doc.pdf');

    expect(characteristics.hasImages).toBe(true);
    expect(characteristics.isScanned).toBe(false);
  });

  test('detects tables in the sampled layout text', async () => {
    read.mockResolvedValue({ pageCount: 1, metadata: {} });
    extractPageText.mockResolvedValue('Item    Price\nTea     3\nCake    5\n');

    const { characteristics } = await sampler.sample('/tmp/doc.pdf');

    expect(characteristics.hasTables).toBe(true);
  });

  test('returns empty traits for a 0-page document', async () => {
    read.mockResolvedValue({ pageCount: 0, metadata: {} });

    const result = await sampler.sample('/tmp/empty.pdf');

    expect(extractPageText).not.toHaveBeenCalled();
    expect(list).not.toHaveBeenCalled();
    expect(result).toEqual({
      characteristics: {
        pageCount: 0,
        fileSizeBytes: 2048,
        hasImages: false,
        hasTables: false,
        isScanned: false,
      },
      firstPageText: '',
    });
  });
});
