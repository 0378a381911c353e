import type { LoggerMethods } from '@pdfloom/logger';
import type { ScheduledTask } from 'node-cron';

import type { TaskRegistry } from '../registry/task-registry';

import cron from 'node-cron';

/** A cache the scheduler sweeps, with the name used in log lines */
export interface SweepableCache {
  name: string;
  sweep(): number;
}

export interface MaintenanceResult {
  tasksRemoved: number;
  cacheEntriesRemoved: Record<string, number>;
}

export interface MaintenanceSchedulerOptions {
  /** Cron expression (default: every minute) */
  cronExpression?: string;
}

/**
 * Periodically drops expired tasks from the registry and expired entries
 * from every cache.
 */
export class MaintenanceScheduler {
  private scheduledTask: ScheduledTask | null = null;
  private readonly cronExpression: string;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly registry: TaskRegistry,
    private readonly caches: readonly SweepableCache[],
    options: MaintenanceSchedulerOptions = {},
  ) {
    this.cronExpression = options.cronExpression ?? '* * * * *';
  }

  get isRunning(): boolean {
    return this.scheduledTask !== null;
  }

  start(): void {
    if (this.scheduledTask) {
      this.logger.debug('[MaintenanceScheduler] Already started');
      return;
    }

    this.scheduledTask = cron.schedule(this.cronExpression, () => {
      this.runOnce();
    });

    this.logger.info(
      `[MaintenanceScheduler] Started (schedule: ${this.cronExpression})`,
    );
  }

  stop(): void {
    if (this.scheduledTask) {
      this.scheduledTask.stop();
      this.scheduledTask = null;
      this.logger.info('[MaintenanceScheduler] Stopped');
    }
  }

  runOnce(): MaintenanceResult {
    const result: MaintenanceResult = {
      tasksRemoved: 0,
      cacheEntriesRemoved: {},
    };

    try {
      result.tasksRemoved = this.registry.sweepExpired();
    } catch (error) {
      this.logger.error('[MaintenanceScheduler] Task sweep failed:', error);
    }

    for (const cache of this.caches) {
      try {
        result.cacheEntriesRemoved[cache.name] = cache.sweep();
      } catch (error) {
        this.logger.error(
          `[MaintenanceScheduler] Sweep of ${cache.name} failed:`,
          error,
        );
      }
    }

    const cacheSummary = Object.entries(result.cacheEntriesRemoved)
      .map(([name, count]) => `${name}=${count}`)
      .join(', ');
    this.logger.info(
      `[MaintenanceScheduler] Removed ${result.tasksRemoved} tasks; ` +
        `cache entries: ${cacheSummary || 'none'}`,
    );
    return result;
  }
}
