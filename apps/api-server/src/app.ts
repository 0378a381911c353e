import type { Express } from 'express';

import type { AppDeps } from './types';

import express from 'express';

import { createErrorHandler } from './middleware/error-handler';
import { createExtractionRouter } from './routes/extraction.routes';
import { createTaskRouter } from './routes/task.routes';

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'pdf-extraction-api' });
  });
  app.use(createTaskRouter(deps));
  app.use(createExtractionRouter(deps));

  app.use(createErrorHandler(deps.logger));
  return app;
}
