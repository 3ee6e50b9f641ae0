#!/usr/bin/env node
import { startServer } from './http/server.js';
import { logError } from './services/logger.js';

import { toError } from './utils/error-details.js';

const { shutdown } = startServer();

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  void shutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason) => {
  const error = toError(reason);
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});
