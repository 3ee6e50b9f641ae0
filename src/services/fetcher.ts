import type { Dispatcher } from 'undici';

import { config } from '../config/index.js';
import type { FetchedPage, FetchOptions } from '../config/types/runtime.js';

import { dispatcher as sharedDispatcher } from './fetcher/agents.js';
import {
  recordFetchError,
  recordFetchResponse,
  startFetchTelemetry,
} from './fetcher/interceptors.js';
import { fetchWithRedirects } from './fetcher/redirects.js';
import { readResponseBytes } from './fetcher/response.js';
import { classifyTransportError } from './fetcher/transport-errors.js';

export { destroyAgents } from './fetcher/agents.js';

/**
 * Retrieves a page. Resolves with any HTTP status; rejects only with a
 * FetchError describing a transport failure.
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchedPage>;
}

export interface HttpPageFetcherOptions {
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  maxRedirects?: number;
  maxBytes?: number;
  userAgent?: string;
}

const ACCEPT_HEADER =
  'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

const EMPTY_BODY = new Uint8Array(0);

function buildRequestSignal(
  timeoutMs: number,
  external?: AbortSignal
): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  if (!external) return timeoutSignal;
  return AbortSignal.any([external, timeoutSignal]);
}

export class HttpPageFetcher implements PageFetcher {
  private readonly dispatcher: Dispatcher;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly maxBytes: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.dispatcher = options.dispatcher ?? sharedDispatcher;
    this.timeoutMs = options.timeoutMs ?? config.fetcher.timeout;
    this.maxRedirects = options.maxRedirects ?? config.fetcher.maxRedirects;
    this.maxBytes = options.maxBytes ?? config.fetcher.maxContentLength;
    this.headers = {
      'User-Agent': options.userAgent ?? config.fetcher.userAgent,
      Accept: ACCEPT_HEADER,
    };
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    const telemetry = startFetchTelemetry(url);
    const signal = buildRequestSignal(
      options.timeout ?? this.timeoutMs,
      options.signal
    );

    try {
      const { response, url: finalUrl } = await fetchWithRedirects(
        url,
        {
          method: 'GET',
          headers: this.headers,
          signal,
          dispatcher: this.dispatcher,
        },
        this.maxRedirects
      );
      telemetry.url = finalUrl;

      if (!response.ok) {
        await response.body?.cancel();
        recordFetchResponse(telemetry, response.status, 0);
        return {
          url: finalUrl,
          status: response.status,
          statusText: response.statusText,
          body: EMPTY_BODY,
        };
      }

      const { body, size } = await readResponseBytes(
        response,
        finalUrl,
        this.maxBytes,
        signal
      );
      recordFetchResponse(telemetry, response.status, size);

      return {
        url: finalUrl,
        status: response.status,
        statusText: response.statusText,
        body,
      };
    } catch (error) {
      const mapped = classifyTransportError(error, telemetry.url);
      recordFetchError(telemetry, mapped);
      throw mapped;
    }
  }
}
