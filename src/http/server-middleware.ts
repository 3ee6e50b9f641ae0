import { randomUUID } from 'node:crypto';

import type { NextFunction, Request, Response } from 'express';

import type { ErrorResponse } from '../config/types/runtime.js';

import { runWithRequestContext } from '../services/context.js';

export function createJsonParseErrorHandler(): (
  err: Error,
  _req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (
    err: Error,
    _req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    if (err instanceof SyntaxError && 'body' in err) {
      const response: ErrorResponse = {
        error: {
          message: 'Invalid request body: malformed JSON',
          code: 'VALIDATION_ERROR',
          statusCode: 400,
        },
      };
      res.status(400).json(response);
      return;
    }
    next(err);
  };
}

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

/** Reuses a caller-supplied id when it is short and plain, else mints one. */
function resolveRequestId(header: string | string[] | undefined): string {
  const candidate = Array.isArray(header) ? header[0] : header;
  if (candidate && REQUEST_ID_PATTERN.test(candidate)) return candidate;
  return randomUUID();
}

export function createContextMiddleware(): (
  req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = resolveRequestId(req.headers['x-request-id']);
    res.setHeader('X-Request-Id', requestId);
    const route = `${req.method} ${req.path}`;
    runWithRequestContext({ requestId, route }, () => {
      next();
    });
  };
}
