import {
  ANALYSIS_POOL,
  SERVICE_NAME,
  SERVICE_VERSION,
  SIZE_LIMITS,
  TIMEOUT,
} from './constants.js';
import {
  parseBoolean,
  parseInteger,
  parseLogLevel,
  parseString,
} from './env-parsers.js';

export const config = {
  server: {
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    port: parseInteger(process.env.PORT, 8080, { min: 1024, max: 65535 }),
    host: parseString(process.env.HOST, '127.0.0.1'),
  },
  fetcher: {
    timeout: parseInteger(
      process.env.FETCH_TIMEOUT,
      TIMEOUT.DEFAULT_FETCH_TIMEOUT_MS,
      { min: TIMEOUT.MIN_FETCH_TIMEOUT_MS, max: TIMEOUT.MAX_FETCH_TIMEOUT_MS }
    ),
    maxRedirects: parseInteger(process.env.FETCH_MAX_REDIRECTS, 5, {
      min: 0,
      max: 20,
    }),
    userAgent: parseString(process.env.USER_AGENT, 'PageAnalyzer/1.0'),
    maxContentLength: parseInteger(
      process.env.FETCH_MAX_CONTENT_LENGTH,
      SIZE_LIMITS.TEN_MB,
      { min: SIZE_LIMITS.ONE_KB, max: SIZE_LIMITS.FIFTY_MB }
    ),
  },
  cache: {
    enabled: parseBoolean(process.env.CACHE_ENABLED, true),
    // 0 keeps every entry for the life of the process.
    maxEntries: parseInteger(process.env.CACHE_MAX_ENTRIES, 0, {
      min: 0,
      max: 100000,
    }),
  },
  analysis: {
    workerCount: ANALYSIS_POOL.WORKER_COUNT,
    queueMax: ANALYSIS_POOL.WORKER_COUNT * ANALYSIS_POOL.QUEUE_FACTOR,
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enabled: parseBoolean(process.env.ENABLE_LOGGING, true),
  },
  constants: {
    maxUrlLength: 2048,
  },
} as const;
