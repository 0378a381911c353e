import type { PageOutcome } from '@pdfloom/model';

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * The pool keeps up to N workers busy at all times: when a worker finishes
 * an item it immediately takes the next one from the shared cursor. Each
 * worker writes only to the result slot of the index it claimed, so results
 * keep input order whatever the completion order.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently, isolating failures per item.
   *
   * A rejected item is recorded as `{ status: 'rejected', reason }` and the
   * remaining items keep running; the returned promise never rejects because
   * of `processFn`.
   */
  static async runSettled<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemSettled?: (outcome: PageOutcome<R>, index: number) => void,
  ): Promise<PageOutcome<R>[]> {
    const outcomes: PageOutcome<R>[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        let outcome: PageOutcome<R>;
        try {
          const value = await processFn(items[index], index);
          outcome = { status: 'fulfilled', value };
        } catch (error) {
          outcome = {
            status: 'rejected',
            reason: error instanceof Error ? error.message : String(error),
          };
        }
        outcomes[index] = outcome;
        onItemSettled?.(outcome, index);
      }
    }

    await Promise.all(
      ConcurrentPool.spawnWorkers(items.length, concurrency, worker),
    );
    return outcomes;
  }

  private static spawnWorkers(
    itemCount: number,
    concurrency: number,
    worker: () => Promise<void>,
  ): Promise<void>[] {
    const size = Math.min(Math.max(1, Math.floor(concurrency)), itemCount);
    return Array.from({ length: size }, () => worker());
  }
}
