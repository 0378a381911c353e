/**
 * Lifecycle states of an extraction task.
 *
 * `completed` and `error` are terminal: once reached, the task snapshot
 * no longer changes.
 */
export type TaskStatus =
  | 'initializing'
  | 'analyzing'
  | 'optimizing'
  | 'processing'
  | 'finalizing'
  | 'completed'
  | 'error';

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = [
  'completed',
  'error',
];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

/** Category tag of an optimization log entry */
export type OptimizationLogType =
  | 'worker_optimization'
  | 'dpi_optimization'
  | 'preprocessing_optimization'
  | 'chunking_optimization';

export interface OptimizationLogEntry {
  /** Epoch milliseconds */
  time: number;
  message: string;
  type: OptimizationLogType;
}

/**
 * Point-in-time view of a task, as returned to polling clients.
 */
export interface TaskSnapshot<TResult = unknown> {
  taskId: string;
  status: TaskStatus;
  currentStep: number;
  totalSteps: number;
  /** `currentStep / totalSteps * 100`, one decimal */
  percentage: number;
  stepDescription: string;
  message: string | null;
  /** Epoch milliseconds */
  startTime: number;
  /** Epoch milliseconds */
  lastUpdateTime: number;
  /** Seconds since `startTime`, two decimals */
  elapsedTime: number;
  /** Seconds, two decimals; null before the first step and after the last */
  estimatedTimeRemaining: number | null;
  performanceStats: Record<string, number>;
  optimizationLogs: OptimizationLogEntry[];
  resultData?: TResult;
}

/**
 * Answer for an id the registry does not know.
 */
export interface TaskNotFound {
  taskId: string;
  status: 'not_found';
  message: string;
}
