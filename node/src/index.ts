// First import: the logger reads LOG_TYPE and LOG_LEVEL when it loads.
import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from '@/app';
import { loadConfig } from '@/config/app.config';
import { createRetrievalContext, type RetrievalContext } from '@/services/pipeline-deps';
import { configureLogger, logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

const SHUTDOWN_TIMEOUT_MS = 15_000;

function setupGracefulShutdown(server: Server, ctx: RetrievalContext): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`received ${signal}, shutting down`);
    const forced = setTimeout(() => {
      logger.error('forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    server.close(() => {
      ctx
        .close()
        .then(() => {
          clearTimeout(forced);
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error('error during shutdown', { error: errorMessage(err) });
          clearTimeout(forced);
          process.exit(1);
        });
    });
  };
  (['SIGTERM', 'SIGINT'] as const).forEach((signal) => process.on(signal, () => shutdown(signal)));
}

const startServer = async () => {
  const config = loadConfig();
  configureLogger(config.log);
  const ctx = createRetrievalContext(config);
  const app = createApp(ctx);

  const server = app.listen(config.port, () => {
    logger.info(`server running on http://localhost:${config.port}`, { environment: config.nodeEnv });
  });
  setupGracefulShutdown(server, ctx);
};

startServer().catch((error: unknown) => {
  logger.fatal('failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
