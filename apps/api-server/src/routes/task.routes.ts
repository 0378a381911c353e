import type { AppDeps } from '../types';

import { Router } from 'express';

export function createTaskRouter({ registry }: AppDeps): Router {
  const router = Router();

  router.get('/task-progress/:taskId', (req, res) => {
    const progress = registry.getProgress(req.params.taskId);
    res.status(progress.status === 'not_found' ? 404 : 200).json(progress);
  });

  router.get('/task-result/:taskId', (req, res) => {
    const progress = registry.getProgress(req.params.taskId);
    if (progress.status === 'not_found') {
      res.status(404).json(progress);
      return;
    }
    if (progress.status !== 'completed') {
      res.status(400).json({
        taskId: progress.taskId,
        status: progress.status,
        message:
          progress.status === 'error'
            ? (progress.message ?? 'Task failed')
            : 'Task is not completed yet',
      });
      return;
    }

    res.json({
      status: 'success',
      content: progress.resultData,
      executionTime:
        progress.performanceStats.executionTime ?? progress.elapsedTime,
    });
  });

  router.get('/active-tasks', (_req, res) => {
    res.json({ tasks: registry.listActive() });
  });

  return router;
}
