const BYTES = {
  KB: 1024,
  MB: 1024 * 1024,
} as const;

export const SIZE_LIMITS = {
  ONE_KB: 1 * BYTES.KB,
  TEN_MB: 10 * BYTES.MB,
  FIFTY_MB: 50 * BYTES.MB,
} as const;

export const TIMEOUT = {
  DEFAULT_FETCH_TIMEOUT_MS: 30000,
  MIN_FETCH_TIMEOUT_MS: 1000,
  MAX_FETCH_TIMEOUT_MS: 120000,
  FORCED_SHUTDOWN_MS: 10000,
} as const;

export const ANALYSIS_POOL = {
  /** One worker per built-in extraction pass. */
  WORKER_COUNT: 5,
  QUEUE_FACTOR: 2,
} as const;

export const DEFAULT_HTML_VERSION = 'HTML5 (implied)';

export const SERVICE_NAME = 'page-analyzer';
export const SERVICE_VERSION = '1.0.0';
