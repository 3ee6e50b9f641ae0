import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createContextMiddleware,
  createJsonParseErrorHandler,
} from '../src/http/server-middleware.js';
import {
  getRequestContext,
  getRequestId,
} from '../src/services/context.js';

import { createMockRequest, createMockResponse } from './helpers/http.js';

describe('createJsonParseErrorHandler', () => {
  it('answers malformed JSON with a validation error', () => {
    const err = Object.assign(new SyntaxError('Unexpected token'), {
      body: '{bad',
    });
    const res = createMockResponse();
    let nextCalled = false;

    createJsonParseErrorHandler()(err, createMockRequest() as never, res as never, () => {
      nextCalled = true;
    });

    assert.equal(nextCalled, false);
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.jsonBody, {
      error: {
        message: 'Invalid request body: malformed JSON',
        code: 'VALIDATION_ERROR',
        statusCode: 400,
      },
    });
  });

  it('forwards other errors', () => {
    const err = new Error('other');
    let received: unknown;

    createJsonParseErrorHandler()(
      err,
      createMockRequest() as never,
      createMockResponse() as never,
      (value?: unknown) => {
        received = value;
      }
    );

    assert.equal(received, err);
  });
});

describe('createContextMiddleware', () => {
  it('runs the rest of the chain with a request id', () => {
    const res = createMockResponse();
    let seen: string | undefined;

    createContextMiddleware()(createMockRequest() as never, res as never, () => {
      seen = getRequestId();
    });

    assert.ok(seen);
    assert.equal(res.headerMap.get('x-request-id'), seen);
    assert.equal(getRequestId(), undefined);
  });

  it('records the method and path of the request', () => {
    let route: string | undefined;

    createContextMiddleware()(
      createMockRequest({ method: 'GET', path: '/api/status' }) as never,
      createMockResponse() as never,
      () => {
        route = getRequestContext()?.route;
      }
    );

    assert.equal(route, 'GET /api/status');
  });

  it('reuses a plain caller-supplied request id', () => {
    const res = createMockResponse();
    let seen: string | undefined;

    createContextMiddleware()(
      createMockRequest({ headers: { 'x-request-id': 'trace-42.a' } }) as never,
      res as never,
      () => {
        seen = getRequestId();
      }
    );

    assert.equal(seen, 'trace-42.a');
    assert.equal(res.headerMap.get('x-request-id'), 'trace-42.a');
  });

  it('replaces a request id with unexpected characters', () => {
    let seen: string | undefined;

    createContextMiddleware()(
      createMockRequest({ headers: { 'x-request-id': 'bad id<script>' } }) as never,
      createMockResponse() as never,
      () => {
        seen = getRequestId();
      }
    );

    assert.notEqual(seen, 'bad id<script>');
    assert.match(seen ?? '', /^[0-9a-f-]{36}$/);
  });
});
