import { performance } from 'node:perf_hooks';

import type {
  AnalysisRecord,
  AnalysisResponse,
  DocumentHandle,
} from '../config/types/analysis.js';
import type { FetchedPage } from '../config/types/runtime.js';

import {
  createDraft,
  DEFAULT_PASSES,
  type AnalysisDraft,
  type ExtractionContext,
  type RegisteredPass,
} from '../analysis/passes.js';
import { AnalysisError, AppError } from '../errors/app-error.js';

import { formatDuration } from '../utils/duration.js';
import { getErrorMessage, toError } from '../utils/error-details.js';
import { validateAnalysisUrl } from '../utils/url-validator.js';

import type { AnalysisCache } from './cache.js';
import type { PageFetcher } from './fetcher.js';
import { describeHttpStatus } from './fetcher/status-messages.js';
import { logDebug, logInfo, logWarn } from './logger.js';
import type { DocumentParser } from './parser.js';
import { TaskGroup, type TaskFailure } from './task-group.js';
import type { WorkerPool } from './worker-pool.js';

export const READY_STATUS =
  'Service is running and ready for parallel webpage analysis';

export interface Clock {
  /** Wall-clock time for `analyzedAt`. */
  now(): Date;
  /** Milliseconds from an arbitrary origin, for `processingTime`. */
  monotonic(): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  monotonic: () => performance.now(),
};

export interface AnalysisServiceOptions {
  fetcher: PageFetcher;
  parser: DocumentParser;
  cache: AnalysisCache;
  pool: WorkerPool;
  passes?: readonly RegisteredPass[];
  clock?: Clock;
}

export interface ServiceStatus {
  status: string;
  workers: { size: number; active: number; pending: number };
  cachedResults: number;
}

function failedPassesMessage(failures: readonly TaskFailure[]): string {
  const details = failures
    .map(({ name, error }) => `${name} (${error.message})`)
    .join(', ');
  return `Failed to analyze page: ${details}`;
}

function toAnalysisError(error: unknown, url: string): AnalysisError {
  if (error instanceof AnalysisError) return error;
  if (error instanceof AppError) {
    return new AnalysisError(error.statusCode, error.message, url, {
      cause: error,
    });
  }
  return new AnalysisError(500, getErrorMessage(error), url, {
    cause: toError(error),
  });
}

export function toAnalysisResponse(record: AnalysisRecord): AnalysisResponse {
  return {
    url: record.url,
    html_version: record.htmlVersion,
    page_title: record.pageTitle,
    headings: { ...record.headings },
    internal_links: record.internalLinks,
    external_links: record.externalLinks,
    inaccessible_links: record.inaccessibleLinks,
    has_login_form: record.hasLoginForm,
    analyzed_at: record.analyzedAt,
    processing_time: record.processingTime,
  };
}

/**
 * Fetch, parse, fan the extraction passes out over the pool, merge, cache.
 * Every failure surfaces as an {@link AnalysisError}.
 */
export class AnalysisService {
  private readonly fetcher: PageFetcher;
  private readonly parser: DocumentParser;
  private readonly cache: AnalysisCache;
  private readonly pool: WorkerPool;
  private readonly passes: readonly RegisteredPass[];
  private readonly clock: Clock;

  constructor(options: AnalysisServiceOptions) {
    this.fetcher = options.fetcher;
    this.parser = options.parser;
    this.cache = options.cache;
    this.pool = options.pool;
    this.passes = options.passes ?? DEFAULT_PASSES;
    this.clock = options.clock ?? systemClock;
  }

  async analyze(url: string, signal?: AbortSignal): Promise<AnalysisRecord> {
    const cached = this.cache.get(url);
    if (cached) {
      logDebug('Analysis served from cache', { url });
      return cached;
    }

    const pageUrl = this.validate(url);
    const startedAt = this.clock.monotonic();

    const page = await this.fetchPage(url, signal);
    const document = this.parse(page, url);

    const analyzedAt = this.clock.now().toISOString();
    const draft = await this.extract({ document, pageUrl }, url);

    const record: AnalysisRecord = Object.freeze({
      url,
      htmlVersion: draft.htmlVersion,
      pageTitle: draft.pageTitle,
      headings: Object.freeze({ ...draft.headings }),
      internalLinks: draft.links.internal,
      externalLinks: draft.links.external,
      inaccessibleLinks: draft.links.inaccessible,
      hasLoginForm: draft.hasLoginForm,
      analyzedAt,
      processingTime: formatDuration(this.clock.monotonic() - startedAt),
    });

    this.store(url, record);

    logInfo('Page analyzed', {
      url,
      processingTime: record.processingTime,
      internalLinks: record.internalLinks,
      externalLinks: record.externalLinks,
      inaccessibleLinks: record.inaccessibleLinks,
      hasLoginForm: record.hasLoginForm,
    });

    return record;
  }

  getStatus(): ServiceStatus {
    return {
      status: READY_STATUS,
      workers: {
        size: this.pool.size,
        active: this.pool.active,
        pending: this.pool.pending,
      },
      cachedResults: this.cache.size,
    };
  }

  private validate(url: string): URL {
    try {
      return validateAnalysisUrl(url);
    } catch (error) {
      throw new AnalysisError(400, getErrorMessage(error), url, {
        cause: toError(error),
      });
    }
  }

  private async fetchPage(
    url: string,
    signal?: AbortSignal
  ): Promise<FetchedPage> {
    let page: FetchedPage;
    try {
      page = await this.fetcher.fetch(url, { signal });
    } catch (error) {
      throw toAnalysisError(error, url);
    }

    if (page.status < 200 || page.status > 299) {
      throw new AnalysisError(
        page.status,
        describeHttpStatus(page.status, page.statusText),
        url
      );
    }
    return page;
  }

  private parse(page: FetchedPage, url: string): DocumentHandle {
    try {
      return this.parser.parse(page.body);
    } catch (error) {
      throw toAnalysisError(error, url);
    }
  }

  private async extract(
    context: ExtractionContext,
    url: string
  ): Promise<AnalysisDraft> {
    const group = new TaskGroup(this.pool);
    const merges = this.passes.map((pass) => pass.schedule(group, context));

    await group.executeAll();

    const draft = createDraft();
    for (const merge of merges) merge(draft);

    const failures = group.failures();
    if (failures.length > 0) {
      throw new AnalysisError(500, failedPassesMessage(failures), url);
    }
    return draft;
  }

  private store(url: string, record: AnalysisRecord): void {
    try {
      this.cache.set(url, record);
    } catch (error) {
      logWarn('Failed to cache analysis result', {
        url,
        error: getErrorMessage(error),
      });
    }
  }
}
