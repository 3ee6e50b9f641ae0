import type { Server } from 'node:http';

import { TIMEOUT } from '../config/constants.js';

import { destroyAgents } from '../services/fetcher.js';
import { logError, logInfo, logWarn } from '../services/logger.js';
import { shutdownWorkerPool } from '../services/worker-pool.js';

import { getErrorMessage } from '../utils/error-details.js';

export function createShutdownHandler(
  server: Server
): (signal: string) => Promise<void> {
  let shuttingDown = false;
  return async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    await shutdownServer(signal, server);
  };
}

async function shutdownServer(signal: string, server: Server): Promise<void> {
  logInfo(`${signal} received, shutting down gracefully...`);
  scheduleForcedShutdown(TIMEOUT.FORCED_SHUTDOWN_MS);

  await closeServer(server);
  await shutdownWorkerPool();
  await destroyAgents().catch((error: unknown) => {
    logWarn('Failed to close HTTP dispatcher', {
      error: getErrorMessage(error),
    });
  });

  logInfo('Shutdown complete');
  process.exit(0);
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((error) => {
      if (error) {
        logWarn('HTTP server close reported an error', {
          error: error.message,
        });
      } else {
        logInfo('HTTP server closed');
      }
      resolve();
    });
  });
}

function scheduleForcedShutdown(timeoutMs: number): void {
  setTimeout(() => {
    logError('Forced shutdown after timeout');
    process.exit(1);
  }, timeoutMs).unref();
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
