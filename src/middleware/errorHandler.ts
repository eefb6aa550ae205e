import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import { AppError, ConstraintViolationError, ValidationError } from '../utils/errors';

/**
 * Body sent for every failed request
 */
export interface ErrorBody {
  status: 'error';
  code: string;
  message: string;
  field?: string;
  constraint?: string;
}

function clientStatus(err: Error): number | undefined {
  // body-parser marks malformed JSON with a 4xx `status`
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

/**
 * Global error handling middleware
 * Maps store errors to their HTTP status; anything unexpected becomes a 500
 * without internals in the body.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const appError = err instanceof AppError ? err : undefined;
  const statusCode = appError?.statusCode ?? clientStatus(err) ?? 500;

  logger.log(statusCode >= 500 ? 'error' : 'warn', 'Request failed', {
    message: err.message,
    stack: statusCode >= 500 ? err.stack : undefined,
    statusCode,
    path: req.path,
    method: req.method,
    isOperational: appError?.isOperational ?? false,
  });

  const body: ErrorBody = {
    status: 'error',
    code: appError?.code ?? (statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR'),
    message: appError || statusCode < 500 ? err.message : 'Internal server error',
  };

  if (err instanceof ValidationError) {
    body.field = err.field;
  }
  if (err instanceof ConstraintViolationError) {
    body.constraint = err.constraint;
  }

  res.status(statusCode).json(body);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    status: 'error',
    code: 'NOT_FOUND',
    message: `Route ${req.originalUrl} not found`,
  });
}

/**
 * Async route wrapper to catch errors in async functions
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void> | void) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
}
