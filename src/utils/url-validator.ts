import { config } from '../config/index.js';

import { ValidationError } from '../errors/app-error.js';

function assertUrlNotEmpty(trimmedUrl: string): void {
  if (!trimmedUrl) {
    throw new ValidationError('URL cannot be empty');
  }
}

function assertUrlLength(trimmedUrl: string): void {
  if (trimmedUrl.length > config.constants.maxUrlLength) {
    throw new ValidationError(
      `URL exceeds maximum length of ${config.constants.maxUrlLength} characters`
    );
  }
}

function parseUrl(trimmedUrl: string): URL {
  if (!URL.canParse(trimmedUrl)) {
    throw new ValidationError('Invalid URL format', { url: trimmedUrl });
  }
  return new URL(trimmedUrl);
}

function assertProtocolAllowed(url: URL): void {
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(
      `Invalid protocol: ${url.protocol}. Only http: and https: are allowed`
    );
  }
}

function assertHostnamePresent(url: URL): void {
  if (!url.hostname) {
    throw new ValidationError('URL must have a valid hostname');
  }
}

/** Returns the parsed URL; the caller keeps the original string as its key. */
export function validateAnalysisUrl(urlString: string): URL {
  const trimmedUrl = urlString.trim();
  assertUrlNotEmpty(trimmedUrl);
  assertUrlLength(trimmedUrl);

  const url = parseUrl(trimmedUrl);
  assertProtocolAllowed(url);
  assertHostnamePresent(url);

  return url;
}
