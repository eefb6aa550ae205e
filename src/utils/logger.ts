import winston from 'winston';
import path from 'path';
import fs from 'fs';

/**
 * Winston Logger Configuration
 * Structured logging for the store, the local API and the CLI.
 *
 * Metadata passed to these helpers must stay free of patient names, dates of
 * birth and credentials: ids, counts and durations only.
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(
    ({ timestamp, level, message, stack, ...metadata }) => {
      let msg = `${timestamp} [${level.toUpperCase()}]: ${message}`;

      if (stack) {
        msg += `\n${stack}`;
      }

      if (Object.keys(metadata).length > 0) {
        msg += `\n${JSON.stringify(metadata, null, 2)}`;
      }

      return msg;
    }
  )
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      logFormat
    ),
  }),
];

// File transports only when a log directory is configured
const logsDir = process.env.LOG_DIR;
if (logsDir && process.env.NODE_ENV !== 'test') {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      format: logFormat,
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: logFormat,
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports,
  exitOnError: false,
});

// Suppress console logging in test environment
if (process.env.NODE_ENV === 'test') {
  logger.silent = true;
}

/**
 * Helper functions for common logging scenarios
 */
export const loggers = {
  /**
   * Log database operation
   */
  dbOperation: (operation: string, table: string, details?: Record<string, unknown>) => {
    logger.debug('Database Operation', {
      operation,
      table,
      details: details ? JSON.stringify(details) : undefined,
    });
  },

  cacheHit: (key: string) => {
    logger.debug('Cache Hit', { key });
  },

  cacheMiss: (key: string, reason: 'absent' | 'dirty' | 'expired') => {
    logger.debug('Cache Miss', { key, reason });
  },

  cacheRecompute: (key: string, durationMs: number) => {
    logger.debug('Cache Recompute', { key, duration: `${durationMs}ms` });
  },

  cacheInvalidate: (keys: readonly string[]) => {
    logger.debug('Cache Invalidate', { keys });
  },

  /**
   * Log a schema migration step
   */
  migration: (version: number, name: string, status: 'applying' | 'applied' | 'failed') => {
    const log = status === 'failed' ? logger.error.bind(logger) : logger.info.bind(logger);
    log(`Migration ${String(version).padStart(3, '0')}_${name}: ${status}`);
  },

  /**
   * Log search plan and result size
   */
  search: (strategy: string, total: number, durationMs: number) => {
    logger.debug('Search', { strategy, total, duration: `${durationMs}ms` });
  },

  httpRequest: (method: string, path: string, ip?: string) => {
    logger.info('HTTP Request', {
      method,
      path,
      ip,
    });
  },

  httpResponse: (method: string, path: string, statusCode: number, duration: number) => {
    logger.info('HTTP Response', {
      method,
      path,
      statusCode,
      duration: `${duration}ms`,
    });
  },
};

export default logger;
