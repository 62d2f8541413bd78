import { env } from './config/env';
import { connectDB } from './config/db';
import { createApp } from './app';
import { logger } from './utils/logger';

const startServer = async () => {
  const store = await connectDB({
    url: env.databaseUrl,
    name: env.databaseName,
    debug: env.mongoDebug,
  });

  const app = createApp({
    store,
    databaseUrlSet: Boolean(env.databaseUrl),
  });

  const server = app.listen(env.port, () => {
    logger.info(`Server running in ${env.nodeEnv} mode on port ${env.port}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      (store ? store.close() : Promise.resolve())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Failed to close database connection');
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Startup failure');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught Exception');
});
