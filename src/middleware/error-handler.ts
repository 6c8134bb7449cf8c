import type { NextFunction, Request, Response } from 'express';

import type { ErrorResponse } from '../config/types.js';

import { AppError } from '../errors/app-error.js';

import { logError, logWarn } from '../services/logger.js';

export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: {
      message: `Route ${req.method} ${req.path} not found`,
      code: 'NOT_FOUND',
      statusCode: 404,
    },
  };
  res.status(404).json(response);
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const isAppError = err instanceof AppError;
  const statusCode = isAppError ? err.statusCode : 500;
  const code = isAppError ? err.code : 'INTERNAL_ERROR';
  const message = isAppError ? err.message : 'Internal Server Error';
  const description = `HTTP ${statusCode}: ${err instanceof Error ? err.message : String(err)} - ${req.method} ${req.path}`;

  if (statusCode < 500) {
    logWarn(description, { code });
  } else {
    logError(description, err instanceof Error ? err : undefined);
  }

  if (res.headersSent) {
    next(err);
    return;
  }

  if (isAppError && typeof err.details.retryAfter === 'number') {
    res.set('Retry-After', String(err.details.retryAfter));
  }

  const response: ErrorResponse = {
    error: {
      message,
      code,
      statusCode,
      ...(isAppError && Object.keys(err.details).length > 0
        ? { details: err.details }
        : {}),
    },
  };

  if (process.env.NODE_ENV === 'development' && err instanceof Error) {
    response.error.stack = err.stack;
  }

  res.status(statusCode).json(response);
}
