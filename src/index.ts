import { buildApplication, shutdownApplication } from './container';
import { parseConfig } from './utils/config';
import { loadEnv } from './utils/env';
import { logger } from './utils/logger';

async function bootstrap() {
  loadEnv();
  const config = parseConfig();
  process.env.LOG_LEVEL = config.logLevel;

  const { app, store, executor, orchestrator, registry } = buildApplication(config);
  orchestrator.recoverInterrupted();

  const server = app.listen(config.port, () => {
    logger.info(`${config.appName} listening on port ${config.port}`, {
      version: config.version,
      taskStore: config.taskStore,
      crawlers: registry.list(),
      executor: executor.stats(),
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    try {
      await shutdownApplication({ server, executor, store, config }, signal);
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', { error });
  process.exit(1);
});
