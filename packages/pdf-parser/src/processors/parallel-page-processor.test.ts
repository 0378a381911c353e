import { beforeEach, describe, expect, test, vi } from 'vitest';

import { ParallelPageProcessor } from './parallel-page-processor';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('ParallelPageProcessor', () => {
  let processor: ParallelPageProcessor;

  beforeEach(() => {
    vi.clearAllMocks();
    processor = new ParallelPageProcessor(mockLogger);
  });

  test('keeps input order when later units finish first', async () => {
    const outcomes = await processor.process(
      [1, 2, 3, 4, 5, 6],
      async (page) => {
        await delay((7 - page) * 2);
        return `page ${page}`;
      },
      { workers: 3, label: 'text' },
    );

    expect(outcomes.map((o) => (o.status === 'fulfilled' ? o.value : ''))).toEqual([
      'page 1',
      'page 2',
      'page 3',
      'page 4',
      'page 5',
      'page 6',
    ]);
  });

  test('runs one at a time at or below the sequential threshold', async () => {
    let running = 0;
    let maxRunning = 0;
    const order: number[] = [];

    await processor.process(
      [1, 2, 3, 4, 5],
      async (page) => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await delay(1);
        order.push(page);
        running--;
      },
      { workers: 4, sequentialThreshold: 5, label: 'text' },
    );

    expect(maxRunning).toBe(1);
    expect(order).toEqual([1, 2, 3, 4, 5]);
  });

  test('runs in parallel above the threshold, bounded by workers', async () => {
    let running = 0;
    let maxRunning = 0;

    await processor.process(
      [1, 2, 3, 4, 5, 6],
      async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await delay(2);
        running--;
      },
      { workers: 4, sequentialThreshold: 5, label: 'text' },
    );

    expect(maxRunning).toBe(4);
  });

  test('fast mode runs small inputs in parallel', async () => {
    let running = 0;
    let maxRunning = 0;

    await processor.process(
      [1, 2, 3],
      async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await delay(2);
        running--;
      },
      { workers: 4, sequentialThreshold: 3, fastMode: true, label: 'structured' },
    );

    expect(maxRunning).toBe(3);
  });

  test('isolates failures and logs them', async () => {
    const outcomes = await processor.process(
      [1, 2, 3],
      async (page) => {
        if (page === 2) {
          throw new Error('corrupt page');
        }
        return page * 10;
      },
      { workers: 2, label: 'ocr' },
    );

    expect(outcomes).toEqual([
      { status: 'fulfilled', value: 10 },
      { status: 'rejected', reason: 'corrupt page' },
      { status: 'fulfilled', value: 30 },
    ]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[ParallelPageProcessor] ocr unit 2 failed: corrupt page',
    );
  });

  test('returns an empty list for no units', async () => {
    const op = vi.fn();

    await expect(
      processor.process([], op, { workers: 4, label: 'text' }),
    ).resolves.toEqual([]);
    expect(op).not.toHaveBeenCalled();
  });

  describe('collect', () => {
    test('substitutes the neutral value and lists failed pages', () => {
      const result = ParallelPageProcessor.collect(
        [
          { status: 'fulfilled', value: { page: 4, content: 'four' } },
          { status: 'rejected', reason: 'timeout' },
        ],
        [4, 5],
        (page) => ({ page, content: '' }),
      );

      expect(result).toEqual({
        values: [
          { page: 4, content: 'four' },
          { page: 5, content: '' },
        ],
        failedPages: [{ page: 5, reason: 'timeout' }],
      });
    });
  });
});
