import express from 'express';
import type { Express } from 'express';
import type { Server } from 'node:http';

import { config } from '../config/index.js';

import { errorHandler } from '../middleware/error-handler.js';

import { AnalysisService } from '../services/analyzer.js';
import { createAnalysisCache } from '../services/cache.js';
import { HttpPageFetcher } from '../services/fetcher.js';
import { logError, logInfo } from '../services/logger.js';
import { CheerioDocumentParser } from '../services/parser.js';
import { getOrCreateWorkerPool } from '../services/worker-pool.js';

import { registerRoutes } from './routes.js';
import {
  createContextMiddleware,
  createJsonParseErrorHandler,
} from './server-middleware.js';
import {
  createShutdownHandler,
  registerSignalHandlers,
} from './server-shutdown.js';

export function createApp(service: AnalysisService): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(express.json({ limit: '16kb' }));
  app.use(createContextMiddleware());
  app.use(createJsonParseErrorHandler());
  registerRoutes(app, service);
  app.use(errorHandler);

  return app;
}

export function createDefaultService(): AnalysisService {
  return new AnalysisService({
    fetcher: new HttpPageFetcher(),
    parser: new CheerioDocumentParser(),
    cache: createAnalysisCache(),
    pool: getOrCreateWorkerPool(),
  });
}

function startListening(app: Express): Server {
  const { host, port } = config.server;
  return app
    .listen(port, host, () => {
      logInfo('Page analyzer started', { host, port });
      process.stdout.write(
        `Page analyzer running at http://${host}:${port}\n`
      );
      process.stdout.write(
        `  Analyze: POST http://${host}:${port}/api/analyze\n`
      );
      process.stdout.write(
        `  Health check: http://${host}:${port}/api/health\n`
      );
    })
    .on('error', (err) => {
      logError('Failed to start server', err);
      process.exit(1);
    });
}

export function startServer(): {
  server: Server;
  shutdown: (signal: string) => Promise<void>;
} {
  const app = createApp(createDefaultService());
  const server = startListening(app);
  const shutdown = createShutdownHandler(server);
  registerSignalHandlers(shutdown);
  return { server, shutdown };
}
