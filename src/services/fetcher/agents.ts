import os from 'node:os';

import { Agent } from 'undici';

import { config } from '../../config/index.js';

function getAgentOptions(): ConstructorParameters<typeof Agent>[0] {
  const { timeout } = config.fetcher;
  return {
    keepAliveTimeout: 60000,
    // Enough sockets for every worker to hold a few pages in flight.
    connections: Math.max(
      os.availableParallelism() * 2,
      config.analysis.workerCount * 4
    ),
    pipelining: 1,
    connect: { timeout },
    headersTimeout: timeout,
    bodyTimeout: timeout,
  };
}

/** Shared connection pool for every outbound page fetch. */
export const dispatcher = new Agent(getAgentOptions());

export async function destroyAgents(): Promise<void> {
  await dispatcher.close();
}
