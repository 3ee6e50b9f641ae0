import { randomUUID } from 'node:crypto';
import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import type { FetchError } from '../../errors/app-error.js';

import { formatDuration } from '../../utils/duration.js';

import { logDebug, logWarn } from '../logger.js';

type FetchChannelEvent =
  | {
      v: 1;
      type: 'start';
      fetchId: string;
      url: string;
    }
  | {
      v: 1;
      type: 'end';
      fetchId: string;
      url: string;
      status: number;
      bytes: number;
      duration: number;
    }
  | {
      v: 1;
      type: 'error';
      fetchId: string;
      url: string;
      error: string;
      status: number;
      duration: number;
    };

export const FETCH_CHANNEL_NAME = 'page-analyzer.fetch';

const SLOW_FETCH_MS = 5000;

const fetchChannel = diagnosticsChannel.channel(FETCH_CHANNEL_NAME);

function publishFetchEvent(event: FetchChannelEvent): void {
  if (!fetchChannel.hasSubscribers) return;
  fetchChannel.publish(event);
}

export interface FetchTelemetry {
  readonly fetchId: string;
  readonly startTime: number;
  url: string;
}

export function startFetchTelemetry(url: string): FetchTelemetry {
  const telemetry: FetchTelemetry = {
    fetchId: randomUUID(),
    startTime: performance.now(),
    url,
  };

  publishFetchEvent({ v: 1, type: 'start', fetchId: telemetry.fetchId, url });
  logDebug('Fetching page', { fetchId: telemetry.fetchId, url });

  return telemetry;
}

export function recordFetchResponse(
  telemetry: FetchTelemetry,
  status: number,
  bytes: number
): void {
  const duration = performance.now() - telemetry.startTime;

  publishFetchEvent({
    v: 1,
    type: 'end',
    fetchId: telemetry.fetchId,
    url: telemetry.url,
    status,
    bytes,
    duration,
  });

  logDebug('Page fetched', {
    fetchId: telemetry.fetchId,
    url: telemetry.url,
    status,
    bytes,
    duration: formatDuration(duration),
  });

  if (duration > SLOW_FETCH_MS) {
    logWarn('Slow page fetch', {
      url: telemetry.url,
      duration: formatDuration(duration),
    });
  }
}

export function recordFetchError(
  telemetry: FetchTelemetry,
  error: FetchError
): void {
  const duration = performance.now() - telemetry.startTime;

  publishFetchEvent({
    v: 1,
    type: 'error',
    fetchId: telemetry.fetchId,
    url: error.url,
    error: error.message,
    status: error.statusCode,
    duration,
  });

  logWarn('Page fetch failed', {
    fetchId: telemetry.fetchId,
    url: error.url,
    status: error.statusCode,
    error: error.message,
  });
}
