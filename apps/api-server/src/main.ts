import { createConsoleLogger } from '@pdfloom/logger';

import { createApp } from './app';
import { loadServerConfig } from './config/server-config';
import { createContainer } from './container';

const SHUTDOWN_GRACE_MS = 10_000;

const config = loadServerConfig();
const logger = createConsoleLogger(config.logLevel);
const container = createContainer(config, logger);

const server = createApp(container).listen(config.port, config.host, () => {
  logger.info(
    `[ApiServer] Listening on http://${config.host}:${config.port} ` +
      `(${config.maxWorkers} workers, OCR language ${config.ocrLanguage})`,
  );
});
container.scheduler.start();

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`[ApiServer] ${signal} received, shutting down`);

  container.scheduler.stop();
  server.close();
  setTimeout(() => {
    logger.warn('[ApiServer] Tasks still running, exiting anyway');
    process.exit(1);
  }, SHUTDOWN_GRACE_MS).unref();

  container.submissions
    .whenIdle()
    .then(() => {
      container.registry.dispose();
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('[ApiServer] Shutdown failed:', error);
      process.exit(1);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
