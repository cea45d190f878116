import { logger } from '@mergington/utils';
import type { FastifyInstance } from 'fastify';

const FORCE_SHUTDOWN_MS = 10000;

export function setupGracefulShutdown(app: FastifyInstance): void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

  let isShuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress');
      return;
    }

    isShuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown...');

    // Set a timeout for forceful shutdown
    const forceShutdownTimeout = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, FORCE_SHUTDOWN_MS);

    try {
      // Stop accepting new connections; the directory lives only in memory
      logger.info('Closing HTTP server...');
      await app.close();
      logger.info('HTTP server closed');

      clearTimeout(forceShutdownTimeout);
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      clearTimeout(forceShutdownTimeout);
      process.exit(1);
    }
  };

  signals.forEach((signal) => {
    process.on(signal, () => {
      void shutdown(signal);
    });
  });

  // Handle uncaught exceptions
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    void shutdown('SIGTERM');
  });

  // Handle unhandled rejections
  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('SIGTERM');
  });
}
