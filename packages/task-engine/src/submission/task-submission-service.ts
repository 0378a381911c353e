import type { LoggerMethods } from '@pdfloom/logger';
import type { ExtractionOptions } from '@pdfloom/model';

import type { ExtractionOrchestrator } from '../orchestrator/extraction-orchestrator';
import type { TaskRegistry } from '../registry/task-registry';
import type { DocumentSource } from '../sources/document-source';

import { randomUUID } from 'node:crypto';

import {
  EXTRACTION_STEP_DESCRIPTIONS,
  EXTRACTION_TOTAL_STEPS,
} from '../config/constants';

export interface SubmittedTask {
  taskId: string;
}

/**
 * Accepts extraction jobs and runs them in the background.
 *
 * `submit` registers the task before returning, so the id can be polled
 * right away; the workflow itself is not awaited.
 */
export class TaskSubmissionService {
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    private readonly logger: LoggerMethods,
    private readonly registry: TaskRegistry,
    private readonly orchestrator: ExtractionOrchestrator,
    private readonly createTaskId: () => string = () => `task_${randomUUID()}`,
  ) {}

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  submit(source: DocumentSource, options: ExtractionOptions): SubmittedTask {
    const taskId = this.createTaskId();
    const tracker = this.registry.create(
      taskId,
      EXTRACTION_TOTAL_STEPS,
      EXTRACTION_STEP_DESCRIPTIONS,
    );

    const run = this.orchestrator
      .run(tracker, source, options)
      .catch((error: unknown) => {
        this.logger.error(`[TaskSubmissionService] ${taskId} crashed:`, error);
      })
      .finally(() => {
        this.inFlight.delete(taskId);
      });
    this.inFlight.set(taskId, run);

    this.logger.info(`[TaskSubmissionService] Submitted ${taskId}`);
    return { taskId };
  }

  /**
   * Resolves once no task is running, including tasks submitted meanwhile.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }
}
