import { spawnAsync } from '@pdfloom/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { PageRenderer } from './page-renderer';

vi.mock('@pdfloom/shared', () => ({
  spawnAsync: vi.fn(),
}));

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  readdirSync: vi.fn(),
}));

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const mockSpawnAsync = spawnAsync as Mock;
const mockExistsSync = existsSync as Mock;
const mockReaddirSync = readdirSync as Mock;

describe('PageRenderer', () => {
  let renderer: PageRenderer;

  beforeEach(() => {
    vi.clearAllMocks();
    renderer = new PageRenderer(mockLogger);
    mockExistsSync.mockReturnValue(false);
    mockReaddirSync.mockReturnValue([]);
    mockSpawnAsync.mockResolvedValue({ code: 0, stdout: '', stderr: '' });
  });

  describe('renderPages', () => {
    test('creates pages directory if it does not exist', async () => {
      await renderer.renderPages('/tmp/input.pdf', '/tmp/output');

      expect(mkdirSync).toHaveBeenCalledWith('/tmp/output/pages', {
        recursive: true,
      });
    });

    test('skips creating pages directory if it already exists', async () => {
      mockExistsSync.mockReturnValue(true);

      await renderer.renderPages('/tmp/input.pdf', '/tmp/output');

      expect(mkdirSync).not.toHaveBeenCalled();
    });

    test('renders the whole document at 300 DPI by default', async () => {
      await renderer.renderPages('/tmp/input.pdf', '/tmp/output');

      expect(mockSpawnAsync).toHaveBeenCalledWith('magick', [
        '-density',
        '300',
        '/tmp/input.pdf',
        '-background',
        'white',
        '-alpha',
        'remove',
        '-alpha',
        'off',
        '-scene',
        '1',
        '/tmp/output/pages/page_%d.png',
      ]);
    });

    test('selects a 0-based frame range and numbers files from firstPage', async () => {
      await renderer.renderPages('/tmp/input.pdf', '/tmp/output', {
        dpi: 150,
        firstPage: 11,
        lastPage: 20,
      });

      expect(mockSpawnAsync).toHaveBeenCalledWith('magick', [
        '-density',
        '150',
        '/tmp/input.pdf[10-19]',
        '-background',
        'white',
        '-alpha',
        'remove',
        '-alpha',
        'off',
        '-scene',
        '11',
        '/tmp/output/pages/page_%d.png',
      ]);
    });

    test('renders to the end when only firstPage is given', async () => {
      await renderer.renderPages('/tmp/input.pdf', '/tmp/output', {
        firstPage: 3,
      });

      expect(mockSpawnAsync.mock.calls[0][1][2]).toBe('/tmp/input.pdf[2--1]');
    });

    test('returns pages of the range sorted numerically', async () => {
      mockReaddirSync.mockReturnValue([
        'page_10.png',
        'page_2.png',
        'page_1.png',
        'page_3.png',
        'other.txt',
      ]);

      const result = await renderer.renderPages('/tmp/input.pdf', '/tmp/out', {
        firstPage: 2,
        lastPage: 10,
      });

      expect(result).toEqual({
        pagesDir: '/tmp/out/pages',
        pages: [
          { page: 2, imagePath: '/tmp/out/pages/page_2.png' },
          { page: 3, imagePath: '/tmp/out/pages/page_3.png' },
          { page: 10, imagePath: '/tmp/out/pages/page_10.png' },
        ],
      });
    });

    test('throws PdfToolError when magick fails', async () => {
      mockSpawnAsync.mockResolvedValue({
        code: 1,
        stdout: '',
        stderr: 'no decode delegate',
      });

      await expect(
        renderer.renderPages('/tmp/input.pdf', '/tmp/output'),
      ).rejects.toThrow('magick failed (exit 1): no decode delegate');
    });
  });
});
