// Logger types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMetadata = Record<string, unknown>;

// Fetcher types
export interface FetchOptions {
  signal?: AbortSignal;
  timeout?: number;
}

export interface FetchedPage {
  /** URL the body was finally read from, after redirects. */
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly body: Uint8Array;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: Record<string, unknown>;
    stack?: string;
  };
}
