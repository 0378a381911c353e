import type { LoggerMethods } from '@pdfloom/logger';
import type { FailedPage, PageOutcome } from '@pdfloom/model';

import { ConcurrentPool } from '@pdfloom/shared';

import { PAGE_PROCESSING } from '../config/constants';

export interface ParallelProcessOptions {
  /** Upper bound on concurrently running units */
  workers?: number;
  /**
   * Inputs of at most this many units run one at a time in index order.
   * Omit to always run in parallel.
   */
  sequentialThreshold?: number;
  /** Always run in parallel, whatever the input size */
  fastMode?: boolean;
  /** Used in log lines, e.g. "text", "ocr" */
  label: string;
}

export interface CollectedOutcomes<R> {
  values: R[];
  failedPages: FailedPage[];
}

/**
 * Fans page units out over a bounded worker pool.
 *
 * Results always line up with the input order. A unit that throws is recorded
 * as a rejected outcome and never stops its siblings.
 */
export class ParallelPageProcessor {
  constructor(private readonly logger: LoggerMethods) {}

  async process<T, R>(
    items: readonly T[],
    op: (item: T, index: number) => Promise<R>,
    options: ParallelProcessOptions,
  ): Promise<PageOutcome<R>[]> {
    const sequential =
      options.sequentialThreshold !== undefined &&
      !options.fastMode &&
      items.length <= options.sequentialThreshold;
    const workers = sequential
      ? 1
      : (options.workers ?? PAGE_PROCESSING.DEFAULT_WORKERS);

    this.logger.debug(
      `[ParallelPageProcessor] ${options.label}: ${items.length} units, ${workers} workers`,
    );

    const outcomes = await ConcurrentPool.runSettled(
      items,
      workers,
      op,
      (outcome, index) => {
        if (outcome.status === 'rejected') {
          this.logger.warn(
            `[ParallelPageProcessor] ${options.label} unit ${index + 1} failed: ${outcome.reason}`,
          );
        }
      },
    );

    return outcomes;
  }

  /**
   * Replaces rejected outcomes with a neutral value and lists the failures.
   *
   * @param pageNumbers - 1-based page number of each outcome, same order
   */
  static collect<R>(
    outcomes: readonly PageOutcome<R>[],
    pageNumbers: readonly number[],
    neutral: (page: number) => R,
  ): CollectedOutcomes<R> {
    const failedPages: FailedPage[] = [];
    const values = outcomes.map((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      failedPages.push({ page: pageNumbers[index], reason: outcome.reason });
      return neutral(pageNumbers[index]);
    });

    return { values, failedPages };
  }
}
