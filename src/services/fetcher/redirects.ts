import { fetch } from 'undici';
import type { RequestInit, Response } from 'undici';

import { FetchError } from '../../errors/app-error.js';

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

interface FetchCycleResult {
  response: Response;
  nextUrl?: string;
}

export function resolveRedirectTarget(
  baseUrl: string,
  location: string
): string {
  if (!URL.canParse(location, baseUrl)) {
    throw new FetchError('Invalid redirect target', baseUrl, 502, {
      location,
    });
  }

  const resolved = new URL(location, baseUrl);
  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    throw new FetchError(
      `Redirect to unsupported protocol ${resolved.protocol}`,
      baseUrl,
      400,
      { location }
    );
  }

  return resolved.href;
}

async function performFetchCycle(
  currentUrl: string,
  init: RequestInit,
  redirectLimit: number,
  redirectCount: number
): Promise<FetchCycleResult> {
  const response = await fetch(currentUrl, { ...init, redirect: 'manual' });

  if (!isRedirectStatus(response.status)) {
    return { response };
  }

  await response.body?.cancel();

  if (redirectCount >= redirectLimit) {
    throw new FetchError('Too many redirects', currentUrl, 508, {
      maxRedirects: redirectLimit,
    });
  }

  const location = response.headers.get('location');
  if (!location) {
    throw new FetchError(
      'Redirect response missing Location header',
      currentUrl,
      502
    );
  }

  return {
    response,
    nextUrl: resolveRedirectTarget(currentUrl, location),
  };
}

/**
 * Follows up to `maxRedirects` hops by hand so each hop is validated.
 * `url` in the result is the address the final response came from.
 */
export async function fetchWithRedirects(
  url: string,
  init: RequestInit,
  maxRedirects: number
): Promise<{ response: Response; url: string }> {
  let currentUrl = url;
  const redirectLimit = Math.max(0, maxRedirects);

  for (
    let redirectCount = 0;
    redirectCount <= redirectLimit;
    redirectCount += 1
  ) {
    const { response, nextUrl } = await performFetchCycle(
      currentUrl,
      init,
      redirectLimit,
      redirectCount
    );

    if (!nextUrl) {
      return { response, url: currentUrl };
    }

    currentUrl = nextUrl;
  }

  throw new FetchError('Too many redirects', currentUrl, 508, {
    maxRedirects: redirectLimit,
  });
}
