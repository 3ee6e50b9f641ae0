import { FetchError } from '../../errors/app-error.js';

import { causeChain, isSystemError } from '../../utils/error-details.js';

const DNS_CODES: ReadonlySet<string> = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'EAI_NONAME',
  'EAI_NODATA',
]);

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const UNREACHABLE_CODES: ReadonlySet<string> = new Set([
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ENETDOWN',
  'EHOSTDOWN',
]);

const TLS_CODES: ReadonlySet<string> = new Set([
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'EPROTO',
]);

export const TRANSPORT_MESSAGES = {
  dns: 'DNS resolution failed: The domain could not be found. Please check if the URL is correct.',
  refused:
    'Connection refused: The server is not accepting connections. The service might be down or the port might be closed.',
  timeout:
    'Request timeout: The server took too long to respond. Please try again later.',
  tls: 'SSL/TLS error: There was a problem with the security certificate. The connection is not secure.',
  protocol:
    'Protocol error: The URL uses an unsupported protocol. Please use http:// or https://.',
  unreachable:
    'Network unreachable: Cannot reach the server. Please check your internet connection.',
  canceled: 'Request was canceled',
} as const;

interface ErrorTrail {
  names: Set<string>;
  codes: Set<string>;
  messages: string[];
}

/** fetch wraps socket errors in `TypeError: fetch failed`; follow `cause`. */
function collectTrail(error: unknown): ErrorTrail {
  const trail: ErrorTrail = { names: new Set(), codes: new Set(), messages: [] };

  for (const link of causeChain(error)) {
    trail.names.add(link.name);
    trail.messages.push(link.message);
    if (isSystemError(link) && link.code) trail.codes.add(link.code);
  }

  return trail;
}

function hasAny(codes: Set<string>, wanted: ReadonlySet<string>): boolean {
  for (const code of codes) {
    if (wanted.has(code)) return true;
  }
  return false;
}

function isTlsFailure(trail: ErrorTrail): boolean {
  for (const code of trail.codes) {
    if (TLS_CODES.has(code)) return true;
    if (code.startsWith('ERR_TLS') || code.startsWith('ERR_SSL')) return true;
    if (code.startsWith('CERT_')) return true;
  }
  return trail.messages.some((message) => /certificate|\btls\b|\bssl\b/i.test(message));
}

function isProtocolFailure(trail: ErrorTrail): boolean {
  return trail.messages.some((message) => /unsupported protocol|unknown scheme/i.test(message));
}

/**
 * Maps a transport failure to its status-like code and user-facing message.
 * HTTP responses never reach here, whatever their status.
 */
export function classifyTransportError(error: unknown, url: string): FetchError {
  if (error instanceof FetchError) return error;

  const trail = collectTrail(error);
  const cause = error instanceof Error ? error : undefined;
  const details = { codes: [...trail.codes] };

  if (trail.names.has('TimeoutError') || hasAny(trail.codes, TIMEOUT_CODES)) {
    return new FetchError(TRANSPORT_MESSAGES.timeout, url, 408, { ...details, reason: 'timeout' }, { cause });
  }
  if (trail.names.has('AbortError')) {
    return new FetchError(TRANSPORT_MESSAGES.canceled, url, 499, { ...details, reason: 'aborted' }, { cause });
  }
  if (hasAny(trail.codes, DNS_CODES)) {
    return new FetchError(TRANSPORT_MESSAGES.dns, url, 404, details, { cause });
  }
  if (trail.codes.has('ECONNREFUSED')) {
    return new FetchError(TRANSPORT_MESSAGES.refused, url, 503, details, { cause });
  }
  if (isTlsFailure(trail)) {
    return new FetchError(TRANSPORT_MESSAGES.tls, url, 495, details, { cause });
  }
  if (isProtocolFailure(trail)) {
    return new FetchError(TRANSPORT_MESSAGES.protocol, url, 400, details, { cause });
  }
  if (hasAny(trail.codes, UNREACHABLE_CODES)) {
    return new FetchError(TRANSPORT_MESSAGES.unreachable, url, 503, details, { cause });
  }

  const reason = trail.messages.at(-1) ?? 'Unexpected error';
  return new FetchError(
    `Network error: ${reason}. Please check your internet connection and try again.`,
    url,
    503,
    details,
    { cause }
  );
}
