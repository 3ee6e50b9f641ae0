import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { FetchError } from '../src/errors/app-error.js';
import { describeHttpStatus } from '../src/services/fetcher/status-messages.js';
import {
  classifyTransportError,
  TRANSPORT_MESSAGES,
} from '../src/services/fetcher/transport-errors.js';

const URL_UNDER_TEST = 'https://example.com/page';

function systemError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function fetchFailed(cause: Error): TypeError {
  return new TypeError('fetch failed', { cause });
}

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('classifyTransportError', () => {
  const cases: Array<[string, unknown, number, string]> = [
    [
      'DNS failures',
      fetchFailed(systemError('getaddrinfo ENOTFOUND example.invalid', 'ENOTFOUND')),
      404,
      TRANSPORT_MESSAGES.dns,
    ],
    [
      'temporary DNS failures',
      fetchFailed(systemError('getaddrinfo EAI_AGAIN example.com', 'EAI_AGAIN')),
      404,
      TRANSPORT_MESSAGES.dns,
    ],
    [
      'refused connections',
      fetchFailed(systemError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED')),
      503,
      TRANSPORT_MESSAGES.refused,
    ],
    [
      'connect timeouts',
      fetchFailed(systemError('Connect Timeout Error', 'UND_ERR_CONNECT_TIMEOUT')),
      408,
      TRANSPORT_MESSAGES.timeout,
    ],
    [
      'deadline timeouts',
      namedError('TimeoutError', 'The operation was aborted due to timeout'),
      408,
      TRANSPORT_MESSAGES.timeout,
    ],
    [
      'certificate failures',
      fetchFailed(systemError('certificate has expired', 'CERT_HAS_EXPIRED')),
      495,
      TRANSPORT_MESSAGES.tls,
    ],
    [
      'unsupported protocols',
      fetchFailed(new Error('unknown scheme')),
      400,
      TRANSPORT_MESSAGES.protocol,
    ],
    [
      'unreachable networks',
      fetchFailed(systemError('connect ENETUNREACH', 'ENETUNREACH')),
      503,
      TRANSPORT_MESSAGES.unreachable,
    ],
    [
      'caller aborts',
      namedError('AbortError', 'This operation was aborted'),
      499,
      TRANSPORT_MESSAGES.canceled,
    ],
  ];

  for (const [label, error, statusCode, message] of cases) {
    it(`maps ${label}`, () => {
      const mapped = classifyTransportError(error, URL_UNDER_TEST);

      assert.ok(mapped instanceof FetchError);
      assert.equal(mapped.statusCode, statusCode);
      assert.equal(mapped.message, message);
      assert.equal(mapped.url, URL_UNDER_TEST);
    });
  }

  it('reports other failures as generic network errors', () => {
    const mapped = classifyTransportError(
      fetchFailed(new Error('socket hang up')),
      URL_UNDER_TEST
    );

    assert.equal(mapped.statusCode, 503);
    assert.equal(
      mapped.message,
      'Network error: socket hang up. Please check your internet connection and try again.'
    );
  });

  it('handles values that are not errors', () => {
    const mapped = classifyTransportError('weird', URL_UNDER_TEST);
    assert.equal(
      mapped.message,
      'Network error: Unexpected error. Please check your internet connection and try again.'
    );
  });

  it('passes FetchErrors through unchanged', () => {
    const original = new FetchError('Too many redirects', URL_UNDER_TEST, 508);
    assert.equal(classifyTransportError(original, 'https://other.test'), original);
  });
});

describe('describeHttpStatus', () => {
  it('uses the fixed message for known statuses', () => {
    assert.equal(
      describeHttpStatus(404, 'Not Found'),
      'Not found: The page does not exist. Please check the URL.'
    );
    assert.equal(
      describeHttpStatus(429),
      'Too many requests: The server is rate limiting requests. Please try again later.'
    );
  });

  it('falls back to the reason phrase', () => {
    assert.equal(describeHttpStatus(418, 'Custom'), 'HTTP 418: Custom');
    assert.equal(describeHttpStatus(599), 'HTTP 599: Unknown Status');
  });
});
