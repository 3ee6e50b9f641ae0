import type { AnalysisErrorResponse } from '../config/types/analysis.js';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

/**
 * Transport-level failure. `statusCode` is a status-like code chosen by the
 * fetcher for the failure class (404 for DNS, 408 for timeouts, ...).
 */
export class FetchError extends AppError {
  readonly url: string;

  constructor(
    message: string,
    url: string,
    httpStatus?: number,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(
      message,
      httpStatus ?? 503,
      httpStatus ? `HTTP_${httpStatus}` : 'FETCH_ERROR',
      { url, httpStatus, ...details },
      options
    );
    this.url = url;
  }
}

export class ParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 422, 'PARSE_ERROR', details);
  }
}

/**
 * The one error the analysis service rejects with. The HTTP layer reports it
 * with a 400 whatever `statusCode` holds.
 */
export class AnalysisError extends AppError {
  readonly url: string;

  constructor(
    statusCode: number,
    message: string,
    url: string,
    options?: ErrorOptions
  ) {
    super(message, statusCode, 'ANALYSIS_ERROR', { url }, options);
    this.url = url;
  }

  toJSON(): AnalysisErrorResponse {
    return {
      status_code: this.statusCode,
      error_message: this.message,
      url: this.url,
    };
  }
}
