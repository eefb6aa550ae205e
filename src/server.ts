import app from './app';
import logger from './utils/logger';
import { config } from './config/config';
import { closeStore, openStore } from './store';
import { AppError, errorMessage } from './utils/errors';

/**
 * Local API server
 * Opens the store (migrating it first) and serves the loopback API.
 */

// Initialize the store; nothing is served from a store that failed to open
try {
  const store = openStore(config.store.path, config.store);

  if (store.needsFirstRun()) {
    logger.warn('No accounts exist yet; create the first admin via POST /api/auth/setup');
  }
} catch (error) {
  logger.error('Failed to open store', {
    error: errorMessage(error),
    fatal: error instanceof AppError ? error.isFatal : true,
  });
  process.exit(1);
}

// Start server
const server = app.listen(config.server.port, config.server.host, () => {
  logger.info('Server started successfully', {
    host: config.server.host,
    port: config.server.port,
    environment: process.env.NODE_ENV || 'development',
    nodeVersion: process.version,
  });
});

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  server.close(() => {
    closeStore();
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    closeStore();
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('exit', () => closeStore());

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', {
    message: error.message,
    stack: error.stack,
  });

  closeStore();
  process.exit(1);
});

export default server;
