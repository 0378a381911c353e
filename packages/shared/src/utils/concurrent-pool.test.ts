import { describe, expect, test, vi } from 'vitest';

import { ConcurrentPool } from './concurrent-pool';

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('ConcurrentPool', () => {
  describe('runSettled', () => {
    test('keeps input order when later items finish first', async () => {
      const outcomes = await ConcurrentPool.runSettled(
        [30, 10, 20],
        3,
        async (ms) => {
          await delay(ms);
          return `done-${ms}`;
        },
      );

      expect(outcomes).toEqual([
        { status: 'fulfilled', value: 'done-30' },
        { status: 'fulfilled', value: 'done-10' },
        { status: 'fulfilled', value: 'done-20' },
      ]);
    });

    test('returns empty array for empty input', async () => {
      const outcomes = await ConcurrentPool.runSettled(
        [],
        5,
        async (item: number) => item,
      );

      expect(outcomes).toEqual([]);
    });

    test('does not exceed concurrency limit', async () => {
      let active = 0;
      let maxActive = 0;

      await ConcurrentPool.runSettled(
        Array.from({ length: 10 }, (_, i) => i),
        3,
        async (item) => {
          active++;
          maxActive = Math.max(maxActive, active);
          await delay(5);
          active--;
          return item;
        },
      );

      expect(maxActive).toBe(3);
    });

    test('treats a concurrency below 1 as 1', async () => {
      const order: number[] = [];

      await ConcurrentPool.runSettled([1, 2, 3], 0, async (item) => {
        order.push(item);
        return item;
      });

      expect(order).toEqual([1, 2, 3]);
    });

    test('isolates a failing item from its siblings', async () => {
      const outcomes = await ConcurrentPool.runSettled(
        [1, 2, 3],
        2,
        async (item) => {
          if (item === 2) throw new Error('bad page');
          return item * 2;
        },
      );

      expect(outcomes).toEqual([
        { status: 'fulfilled', value: 2 },
        { status: 'rejected', reason: 'bad page' },
        { status: 'fulfilled', value: 6 },
      ]);
    });

    test('stringifies non-Error rejections', async () => {
      const outcomes = await ConcurrentPool.runSettled([1], 1, async () => {
        throw 'plain failure';
      });

      expect(outcomes).toEqual([
        { status: 'rejected', reason: 'plain failure' },
      ]);
    });

    test('reports each settled outcome with its index', async () => {
      const onItemSettled = vi.fn();

      await ConcurrentPool.runSettled(
        ['x'],
        4,
        async (item) => item,
        onItemSettled,
      );

      expect(onItemSettled).toHaveBeenCalledWith(
        { status: 'fulfilled', value: 'x' },
        0,
      );
    });
  });
});
