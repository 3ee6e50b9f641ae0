import { STATUS_CODES } from 'node:http';

const STATUS_MESSAGES: Readonly<Record<number, string>> = {
  400: 'Bad request: The server could not understand the request.',
  401: 'Unauthorized: The page requires authentication.',
  403: 'Forbidden: Access to this page is denied.',
  404: 'Not found: The page does not exist. Please check the URL.',
  405: 'Method not allowed: The server does not accept GET requests for this page.',
  408: 'Request timeout: The server timed out waiting for the request.',
  410: 'Gone: The page has been permanently removed.',
  429: 'Too many requests: The server is rate limiting requests. Please try again later.',
  500: 'Internal server error: The target server encountered an error.',
  502: 'Bad gateway: The target server received an invalid response from upstream.',
  503: 'Service unavailable: The target server is temporarily unavailable.',
  504: 'Gateway timeout: The target server did not respond in time.',
};

export function describeHttpStatus(status: number, statusText = ''): string {
  const known = STATUS_MESSAGES[status];
  if (known) return known;

  const reason = statusText || STATUS_CODES[status] || 'Unknown Status';
  return `HTTP ${status}: ${reason}`;
}
