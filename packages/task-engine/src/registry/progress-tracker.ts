import type { LoggerMethods } from '@pdfloom/logger';
import type {
  OptimizationLogEntry,
  OptimizationLogType,
  TaskSnapshot,
  TaskStatus,
} from '@pdfloom/model';

import { isTerminalStatus } from '@pdfloom/model';
import { clamp, round } from 'es-toolkit';

/**
 * Storage a tracker writes its snapshots to. Implemented by TaskRegistry.
 */
export interface TaskStore {
  now(): number;
  save(snapshot: TaskSnapshot): void;
  /** Called once, when the task reaches a terminal status */
  markFinished(taskId: string): void;
}

export interface ProgressTrackerInit {
  taskId: string;
  totalSteps: number;
  stepDescriptions: Readonly<Record<number, string>>;
}

/**
 * Write handle for a single task.
 *
 * The tracker is the only writer of its task. Every mutation is written
 * through to the store immediately, so a poll always sees the latest state.
 * Progress only moves forward: a smaller step than the one recorded is
 * ignored, and once the task is completed or failed nothing changes anymore.
 */
export class ProgressTracker {
  readonly taskId: string;
  readonly totalSteps: number;
  readonly startTime: number;

  private readonly stepDescriptions: Readonly<Record<number, string>>;
  private _currentStep = 0;
  private _status: TaskStatus = 'initializing';
  private message: string | null = null;
  private lastUpdateTime: number;
  private elapsedMs = 0;
  private estimatedTimeRemaining: number | null = null;
  private readonly performanceStats: Record<string, number> = {};
  private readonly optimizationLogs: OptimizationLogEntry[] = [];
  private resultData: unknown;
  private hasResultData = false;

  constructor(
    private readonly store: TaskStore,
    private readonly logger: LoggerMethods,
    init: ProgressTrackerInit,
  ) {
    this.taskId = init.taskId;
    this.totalSteps = init.totalSteps;
    this.stepDescriptions = init.stepDescriptions;
    this.startTime = store.now();
    this.lastUpdateTime = this.startTime;
    this.persist();
  }

  get currentStep(): number {
    return this._currentStep;
  }

  get status(): TaskStatus {
    return this._status;
  }

  get isFinished(): boolean {
    return isTerminalStatus(this._status);
  }

  /**
   * Record progress.
   *
   * @param currentStep - Clamped to `[0, totalSteps]`; never moves backward
   */
  update(
    currentStep: number,
    status: TaskStatus = 'processing',
    message?: string,
  ): TaskSnapshot {
    if (this.rejectWrite('update')) {
      return this.snapshot();
    }

    const step = clamp(Math.floor(currentStep), 0, this.totalSteps);
    if (step < this._currentStep) {
      this.logger.debug(
        `[ProgressTracker] ${this.taskId}: ignoring step ${step} below ${this._currentStep}`,
      );
    }
    this._currentStep = Math.max(step, this._currentStep);
    this._status = status;
    this.message = message ?? null;

    const now = this.store.now();
    this.lastUpdateTime = now;
    this.elapsedMs = now - this.startTime;
    this.estimatedTimeRemaining =
      this._currentStep > 0 && this._currentStep < this.totalSteps
        ? (this.elapsedMs / 1000 / this._currentStep) *
          (this.totalSteps - this._currentStep)
        : null;

    this.persist();
    if (this.isFinished) {
      this.store.markFinished(this.taskId);
    }
    return this.snapshot();
  }

  complete(message?: string): TaskSnapshot {
    return this.update(this.totalSteps, 'completed', message);
  }

  error(message: string): TaskSnapshot {
    return this.update(this._currentStep, 'error', message);
  }

  addPerformanceStat(name: string, value: number): void {
    if (this.rejectWrite('addPerformanceStat')) {
      return;
    }
    this.performanceStats[name] = value;
    this.persist();
  }

  addOptimizationLog(message: string, type: OptimizationLogType): void {
    if (this.rejectWrite('addOptimizationLog')) {
      return;
    }
    this.optimizationLogs.push({ time: this.store.now(), message, type });
    this.persist();
  }

  setResultData(resultData: unknown): void {
    if (this.rejectWrite('setResultData')) {
      return;
    }
    this.resultData = resultData;
    this.hasResultData = true;
    this.persist();
  }

  snapshot(): TaskSnapshot {
    const snapshot: TaskSnapshot = {
      taskId: this.taskId,
      status: this._status,
      currentStep: this._currentStep,
      totalSteps: this.totalSteps,
      percentage: round((this._currentStep / this.totalSteps) * 100, 1),
      stepDescription:
        this.stepDescriptions[this._currentStep] ??
        `Step ${this._currentStep} of ${this.totalSteps}`,
      message: this.message,
      startTime: this.startTime,
      lastUpdateTime: this.lastUpdateTime,
      elapsedTime: round(this.elapsedMs / 1000, 2),
      estimatedTimeRemaining:
        this.estimatedTimeRemaining === null
          ? null
          : round(this.estimatedTimeRemaining, 2),
      performanceStats: { ...this.performanceStats },
      optimizationLogs: this.optimizationLogs.map((entry) => ({ ...entry })),
    };
    if (this.hasResultData) {
      snapshot.resultData = this.resultData;
    }
    return snapshot;
  }

  private persist(): void {
    this.store.save(this.snapshot());
  }

  private rejectWrite(operation: string): boolean {
    if (!this.isFinished) {
      return false;
    }
    this.logger.warn(
      `[ProgressTracker] ${this.taskId} is ${this._status}; ignoring ${operation}`,
    );
    return true;
  }
}
