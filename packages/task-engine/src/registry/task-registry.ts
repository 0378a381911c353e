import type { LoggerMethods } from '@pdfloom/logger';
import type { TaskNotFound, TaskSnapshot } from '@pdfloom/model';

import type { TaskStore } from './progress-tracker';

import { isTerminalStatus } from '@pdfloom/model';
import { cloneDeep } from 'es-toolkit';

import { TASK_RETENTION } from '../config/constants';
import { DuplicateTaskError } from '../errors/task-errors';
import { ProgressTracker } from './progress-tracker';

export interface TaskRegistryOptions {
  /** Delay before a finished task leaves the active set (default: 300 s) */
  activeRetentionMs?: number;
  /** Idle time after which a finished task is swept (default: 1 h) */
  taskRetentionMs?: number;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * In-memory store of task snapshots and the set of active task ids.
 *
 * Every method runs synchronously to completion, so writes from concurrent
 * tasks never interleave. Snapshots handed out are deep copies.
 *
 * Finished tasks leave the active set after `activeRetentionMs` through a
 * timer owned by the registry (`flushScheduledRemovals` runs them now,
 * `dispose` cancels them). They stay queryable until `sweepExpired` finds
 * them idle for longer than `taskRetentionMs`.
 */
export class TaskRegistry implements TaskStore {
  private readonly tasks = new Map<string, TaskSnapshot>();
  private readonly active = new Set<string>();
  private readonly removalTimers = new Map<string, NodeJS.Timeout>();
  private readonly activeRetentionMs: number;
  private readonly taskRetentionMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly logger: LoggerMethods,
    options: TaskRegistryOptions = {},
  ) {
    this.activeRetentionMs =
      options.activeRetentionMs ?? TASK_RETENTION.ACTIVE_MS;
    this.taskRetentionMs =
      options.taskRetentionMs ?? TASK_RETENTION.REGISTRY_MS;
    this.clock = options.now ?? Date.now;
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Register a task at step 0 and return its write handle.
   *
   * @throws DuplicateTaskError when the id is already registered
   */
  create(
    taskId: string,
    totalSteps = 100,
    stepDescriptions: Readonly<Record<number, string>> = {},
  ): ProgressTracker {
    if (this.tasks.has(taskId)) {
      throw new DuplicateTaskError(taskId);
    }
    if (!Number.isInteger(totalSteps) || totalSteps < 1) {
      throw new RangeError(
        `totalSteps must be a positive integer: ${totalSteps}`,
      );
    }

    this.active.add(taskId);
    const tracker = new ProgressTracker(this, this.logger, {
      taskId,
      totalSteps,
      stepDescriptions,
    });
    this.logger.debug(`[TaskRegistry] Created task ${taskId}`);
    return tracker;
  }

  get(taskId: string): TaskSnapshot | undefined {
    const snapshot = this.tasks.get(taskId);
    return snapshot ? cloneDeep(snapshot) : undefined;
  }

  getProgress(taskId: string): TaskSnapshot | TaskNotFound {
    return (
      this.get(taskId) ?? {
        taskId,
        status: 'not_found',
        message: 'Task not found',
      }
    );
  }

  listActive(): TaskSnapshot[] {
    const snapshots: TaskSnapshot[] = [];
    for (const taskId of this.active) {
      const snapshot = this.get(taskId);
      if (snapshot) {
        snapshots.push(snapshot);
      }
    }
    return snapshots;
  }

  isActive(taskId: string): boolean {
    return this.active.has(taskId);
  }

  /**
   * Remove finished tasks idle for longer than the task retention.
   *
   * @returns Number of tasks removed
   */
  sweepExpired(now: number = this.clock()): number {
    let removed = 0;
    for (const [taskId, snapshot] of [...this.tasks]) {
      if (
        isTerminalStatus(snapshot.status) &&
        now - snapshot.lastUpdateTime > this.taskRetentionMs
      ) {
        this.remove(taskId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.info(`[TaskRegistry] Swept ${removed} expired tasks`);
    }
    return removed;
  }

  /**
   * Run every pending active-set removal immediately.
   *
   * @returns Number of removals run
   */
  flushScheduledRemovals(): number {
    const taskIds = [...this.removalTimers.keys()];
    for (const taskId of taskIds) {
      this.cancelRemoval(taskId);
      this.active.delete(taskId);
    }
    return taskIds.length;
  }

  /**
   * Cancel pending active-set removals, e.g. on shutdown.
   */
  dispose(): void {
    for (const taskId of [...this.removalTimers.keys()]) {
      this.cancelRemoval(taskId);
    }
  }

  now(): number {
    return this.clock();
  }

  save(snapshot: TaskSnapshot): void {
    this.tasks.set(snapshot.taskId, cloneDeep(snapshot));
  }

  markFinished(taskId: string): void {
    this.cancelRemoval(taskId);
    const timer = setTimeout(() => {
      this.removalTimers.delete(taskId);
      this.active.delete(taskId);
      this.logger.debug(`[TaskRegistry] ${taskId} left the active set`);
    }, this.activeRetentionMs);
    timer.unref();
    this.removalTimers.set(taskId, timer);
  }

  private cancelRemoval(taskId: string): void {
    const timer = this.removalTimers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.removalTimers.delete(taskId);
    }
  }

  private remove(taskId: string): void {
    this.cancelRemoval(taskId);
    this.active.delete(taskId);
    this.tasks.delete(taskId);
  }
}
