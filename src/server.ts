import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase, syncSchema } from './config/database';
import { logger } from './observability';

const startServer = async (): Promise<void> => {
  try {
    await connectDatabase();
    await syncSchema();

    const app = createApp();

    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, ...getEnvironmentInfo() }, 'Server running');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        disconnectDatabase()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
