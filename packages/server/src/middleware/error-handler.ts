import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '../utils/logger.js';
import { config } from '../config/index.js';

const logger = createLogger('ErrorHandler');

/**
 * Application-specific error with status code
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational = true
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad request error - business rule violated by otherwise well-formed input
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(400, message);
    this.name = 'BadRequestError';
  }
}

/**
 * Missing, invalid or expired credentials
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Access denied') {
    super(403, message);
    this.name = 'ForbiddenError';
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, message?: string) {
    super(404, message ?? `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message);
    this.name = 'ConflictError';
  }
}

/**
 * Unprocessable input
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(422, message);
    this.name = 'ValidationError';
  }
}

function clientErrorStatus(err: Error): number | null {
  const status = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    const details = err.errors.map(e => ({
      field: e.path.join('.'),
      message: e.message,
    }));
    logger.warn({ details, path: req.path, method: req.method }, 'Validation failed');
    res.status(422).json({
      error: 'Validation error',
      details,
    });
    return;
  }

  // Handle known operational errors
  if (err instanceof AppError) {
    logger.info({
      error: err.message,
      status: err.statusCode,
      path: req.path,
      method: req.method,
    }, 'Request rejected');

    if (err instanceof UnauthorizedError) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    res.status(err.statusCode).json({
      error: err.message,
    });
    return;
  }

  // Body parser failures (malformed JSON, oversized payloads) keep their 4xx status
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    const message = 'type' in err && err.type === 'entity.parse.failed' ? 'Malformed request body' : err.message;
    logger.info({ error: err.message, status: clientStatus, path: req.path, method: req.method }, 'Request rejected');
    res.status(clientStatus).json({ error: message });
    return;
  }

  // Unknown errors never leak their message to the caller
  logger.error({
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
  }, 'Request error');

  res.status(500).json({
    error: 'Internal server error',
  });
}

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: `Route ${req.method} ${req.path} not found`,
  });
}
