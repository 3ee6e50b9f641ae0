import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  AnalysisError,
  ValidationError,
} from '../src/errors/app-error.js';
import { errorHandler } from '../src/middleware/error-handler.js';

import { createMockRequest, createMockResponse } from './helpers/http.js';

describe('errorHandler', () => {
  it('delegates to next when headers are already sent', () => {
    const err = new Error('boom');
    const res = createMockResponse();
    res.headersSent = true;

    let received: unknown;
    errorHandler(err, createMockRequest() as never, res as never, (value?: unknown) => {
      received = value;
    });

    assert.equal(received, err);
    assert.equal(res.statusCode, undefined);
  });

  it('renders analysis errors with 400 and their own body', () => {
    const err = new AnalysisError(
      503,
      'Service unavailable: The target server is temporarily unavailable.',
      'https://example.com'
    );
    const res = createMockResponse();

    errorHandler(err, createMockRequest() as never, res as never, () => {});

    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.jsonBody, {
      status_code: 503,
      error_message:
        'Service unavailable: The target server is temporarily unavailable.',
      url: 'https://example.com',
    });
  });

  it('renders validation errors with their details', () => {
    const err = new ValidationError('Invalid request body', {
      issues: [{ path: 'url', message: 'url is required' }],
    });
    const res = createMockResponse();

    errorHandler(err, createMockRequest() as never, res as never, () => {});

    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.jsonBody, {
      error: {
        message: 'Invalid request body',
        code: 'VALIDATION_ERROR',
        statusCode: 400,
        details: { issues: [{ path: 'url', message: 'url is required' }] },
      },
    });
  });

  it('renders generic errors as internal server errors', () => {
    const res = createMockResponse();

    errorHandler(new Error('boom'), createMockRequest() as never, res as never, () => {});

    assert.equal(res.statusCode, 500);
    assert.deepEqual(res.jsonBody, {
      error: {
        message: 'Internal Server Error',
        code: 'INTERNAL_ERROR',
        statusCode: 500,
      },
    });
  });
});
