import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { InvalidDefinitionError } from '@rollout/shared';
import { ConflictError, NotFoundError, StorageOpError } from '../../lib/errors.js';
import logger from '../../lib/logger.js';

const apiLogger = logger.child({ component: 'api-error' });

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

interface ErrorBody {
  statusCode: number;
  code: string;
  message: string;
  details?: string[];
}

function hasStatusCode(err: unknown): err is ApiError & { statusCode: number } {
  return err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number';
}

function describeError(err: unknown): ErrorBody {
  if (err instanceof InvalidDefinitionError) {
    return {
      statusCode: 400,
      code: err.reason.toUpperCase().replace(/-/g, '_'),
      message: err.message,
      details: err.issues.length > 0 ? err.issues : undefined,
    };
  }
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Invalid request',
      details: err.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    };
  }
  if (err instanceof NotFoundError) {
    return { statusCode: 404, code: 'NOT_FOUND', message: err.message };
  }
  if (err instanceof ConflictError) {
    return { statusCode: 409, code: 'CONFLICT', message: err.message };
  }
  if (err instanceof StorageOpError) {
    return { statusCode: 500, code: 'STORAGE_ERROR', message: 'Object storage operation failed' };
  }
  if (hasStatusCode(err)) {
    return {
      statusCode: err.statusCode,
      code: err.code || 'REQUEST_ERROR',
      message: err.message,
    };
  }
  return { statusCode: 500, code: 'INTERNAL_ERROR', message: 'Internal server error' };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, code, message, details } = describeError(err);

  // Log at appropriate level based on status code
  if (statusCode >= 500) {
    apiLogger.error({ err, statusCode }, 'API error');
  } else {
    apiLogger.warn({ err, statusCode }, 'API client error');
  }

  res.status(statusCode).json({
    error: {
      code,
      message,
      ...(details ? { details } : {}),
    },
  });
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: 'Resource not found',
    },
  });
}

export function createError(message: string, statusCode: number, code?: string): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  return error;
}

/**
 * Forward rejections of an async route handler to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
