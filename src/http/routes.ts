import type {
  Express,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from 'express';

import { config } from '../config/index.js';
import type { ErrorResponse } from '../config/types/runtime.js';

import { AnalysisError, ValidationError } from '../errors/app-error.js';

import {
  toAnalysisResponse,
  type AnalysisService,
} from '../services/analyzer.js';
import { logInfo, logWarn } from '../services/logger.js';

import { analyzeRequestSchema } from './schemas.js';

function parseAnalyzeRequest(body: unknown): string {
  const parsed = analyzeRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid request body', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return parsed.data.url;
}

/** Aborts the analysis when the client goes away before the response. */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

async function handleAnalyze(
  service: AnalysisService,
  req: Request,
  res: Response
): Promise<void> {
  const url = parseAnalyzeRequest(req.body);

  try {
    const record = await service.analyze(url, abortOnDisconnect(res));
    res.status(200).json(toAnalysisResponse(record));
  } catch (error) {
    if (!(error instanceof AnalysisError)) throw error;

    logWarn('Analysis failed', {
      url,
      statusCode: error.statusCode,
      error: error.message,
    });
    res.status(400).json(error.toJSON());
  }
}

export function createAnalyzeHandler(service: AnalysisService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handleAnalyze(service, req, res).catch(next);
  };
}

export function createStatusHandler(service: AnalysisService): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.json(service.getStatus());
  };
}

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'healthy',
    name: config.server.name,
    version: config.server.version,
    uptime: process.uptime(),
  });
}

export function methodNotAllowed(allowed: string): RequestHandler {
  return (req: Request, res: Response): void => {
    logWarn('Method not allowed', { method: req.method, path: req.path });
    const response: ErrorResponse = {
      error: {
        message: 'Method not allowed',
        code: 'METHOD_NOT_ALLOWED',
        statusCode: 405,
      },
    };
    res.set('Allow', allowed).status(405).json(response);
  };
}

export function registerRoutes(app: Express, service: AnalysisService): void {
  app.post('/api/analyze', createAnalyzeHandler(service));
  app.all('/api/analyze', methodNotAllowed('POST'));
  app.get('/api/status', createStatusHandler(service));
  app.get('/api/health', healthHandler);

  logInfo('Routes registered', {
    routes: ['POST /api/analyze', 'GET /api/status', 'GET /api/health'],
  });
}
