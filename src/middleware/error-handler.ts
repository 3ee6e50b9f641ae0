import type { NextFunction, Request, Response } from 'express';

import type { ErrorResponse } from '../config/types/runtime.js';

import { AnalysisError, AppError } from '../errors/app-error.js';

import { logError, logWarn } from '../services/logger.js';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AnalysisError) {
    logWarn(`Analysis failed - ${req.method} ${req.path}`, {
      statusCode: err.statusCode,
      error: err.message,
    });
    res.status(400).json(err.toJSON());
    return;
  }

  const isAppError = err instanceof AppError;
  const statusCode = isAppError ? err.statusCode : 500;
  const code = isAppError ? err.code : 'INTERNAL_ERROR';
  const message = isAppError ? err.message : 'Internal Server Error';

  if (statusCode >= 500) {
    logError(`HTTP ${statusCode}: ${err.message} - ${req.method} ${req.path}`, err);
  } else {
    logWarn(`HTTP ${statusCode}: ${err.message} - ${req.method} ${req.path}`);
  }

  const response: ErrorResponse = {
    error: {
      message,
      code,
      statusCode,
      ...(isAppError &&
        Object.keys(err.details).length > 0 && { details: err.details }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    response.error.stack = err.stack;
  }

  res.status(statusCode).json(response);
}
