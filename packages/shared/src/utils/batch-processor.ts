/**
 * BatchProcessor - splits work into fixed-size batches.
 *
 * Used to render and OCR large documents a chunk of pages at a time so that
 * only one chunk of page images sits on disk at once.
 */
export class BatchProcessor {
  /**
   * Splits an array into batches of `batchSize` (min 1).
   *
   * @example
   * ```typescript
   * BatchProcessor.createBatches([1, 2, 3, 4, 5], 2);
   * // [[1, 2], [3, 4], [5]]
   * ```
   */
  static createBatches<T>(items: readonly T[], batchSize: number): T[][] {
    const size = Math.max(1, Math.floor(batchSize));
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
      batches.push(items.slice(i, i + size));
    }
    return batches;
  }

  /**
   * Runs `processFn` on each batch one after another and flattens the
   * results, preserving item order.
   */
  static async processSequentially<T, R>(
    items: readonly T[],
    batchSize: number,
    processFn: (batch: T[], batchIndex: number) => Promise<R[]>,
  ): Promise<R[]> {
    const results: R[] = [];
    const batches = this.createBatches(items, batchSize);
    for (let i = 0; i < batches.length; i++) {
      results.push(...(await processFn(batches[i], i)));
    }
    return results;
  }
}
