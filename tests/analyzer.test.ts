import assert from 'node:assert/strict';
import { after, describe, it } from 'node:test';

import {
  extractHeadings,
  extractHtmlVersion,
  extractPageTitle,
} from '../src/analysis/field-extractors.js';
import { countLinks } from '../src/analysis/link-classifier.js';
import { hasLoginForm } from '../src/analysis/login-form.js';
import { registerPass, DEFAULT_PASSES } from '../src/analysis/passes.js';
import type { AnalysisRecord } from '../src/config/types/analysis.js';
import { AnalysisError, FetchError, ParseError } from '../src/errors/app-error.js';
import {
  AnalysisService,
  READY_STATUS,
  toAnalysisResponse,
  type AnalysisServiceOptions,
} from '../src/services/analyzer.js';
import {
  InMemoryAnalysisCache,
  type AnalysisCache,
} from '../src/services/cache.js';
import { TRANSPORT_MESSAGES } from '../src/services/fetcher/transport-errors.js';
import { CheerioDocumentParser } from '../src/services/parser.js';
import { WorkerPool } from '../src/services/worker-pool.js';

import { createStepClock, FakePageFetcher } from './helpers/fakes.js';

const PAGE_URL = 'https://example.com';
const ANALYZED_AT = '2024-05-01T12:00:00.000Z';

const EXAMPLE_PAGE = `<!DOCTYPE html><html><head><title>Example Domain</title></head><body><a href="/about">x</a><a href="https://other.com">y</a></body></html>`;

const RICH_PAGE = `<!DOCTYPE html>
<html><head><title> Account Portal </title></head><body>
  <H1>Welcome</H1>
  <h2>News</h2>
  <H2>Help</H2>
  <a href="/docs">Docs</a>
  <a href="//cdn.other.com/lib.js">CDN</a>
  <a href="mailto:team@example.com">Mail</a>
  <a>No href</a>
  <form action="/login" method="post">
    <input type="text" name="username">
    <input type="password" name="password">
    <button type="submit">Sign in</button>
  </form>
</body></html>`;

const EXPECTED_RECORD: AnalysisRecord = {
  url: PAGE_URL,
  htmlVersion: 'HTML5 (implied)',
  pageTitle: 'Example Domain',
  headings: {},
  internalLinks: 1,
  externalLinks: 1,
  inaccessibleLinks: 0,
  hasLoginForm: false,
  analyzedAt: ANALYZED_AT,
  processingTime: '150ms',
};

function isAnalysisError(statusCode: number, message: string) {
  return (error: unknown): boolean =>
    error instanceof AnalysisError &&
    error.statusCode === statusCode &&
    error.message === message &&
    error.url === PAGE_URL;
}

describe('AnalysisService', () => {
  const pools: WorkerPool[] = [];

  after(async () => {
    await Promise.all(pools.map((pool) => pool.shutdown()));
  });

  function createService(
    overrides: Partial<AnalysisServiceOptions> = {}
  ): { service: AnalysisService; fetcher: FakePageFetcher; cache: AnalysisCache } {
    const pool = overrides.pool ?? new WorkerPool({ size: 2 });
    pools.push(pool);

    const fetcher =
      overrides.fetcher instanceof FakePageFetcher
        ? overrides.fetcher
        : new FakePageFetcher({ [PAGE_URL]: { html: EXAMPLE_PAGE } });
    const cache = overrides.cache ?? new InMemoryAnalysisCache();

    const service = new AnalysisService({
      parser: new CheerioDocumentParser(),
      clock: createStepClock(ANALYZED_AT, 150),
      ...overrides,
      fetcher,
      cache,
      pool,
    });
    return { service, fetcher, cache };
  }

  it('analyzes a page end to end', async () => {
    const { service } = createService();
    const record = await service.analyze(PAGE_URL);

    assert.deepEqual(record, EXPECTED_RECORD);
    assert.equal(Object.isFrozen(record), true);
  });

  it('serves repeat requests from the cache', async () => {
    const { service, fetcher } = createService();

    const first = await service.analyze(PAGE_URL);
    const second = await service.analyze(PAGE_URL);

    assert.equal(fetcher.calls.length, 1);
    assert.equal(second, first);
    assert.equal(second.analyzedAt, ANALYZED_AT);
  });

  it('produces the same record with one worker as with five', async () => {
    const wide = createService({ pool: new WorkerPool({ size: 5 }) });
    const narrow = createService({ pool: new WorkerPool({ size: 1 }) });

    const [fromWide, fromNarrow] = await Promise.all([
      wide.service.analyze(PAGE_URL),
      narrow.service.analyze(PAGE_URL),
    ]);

    assert.deepEqual(fromWide, fromNarrow);
  });

  it('merges every pass the same way on a wide pool, a one-slot pool and in sequence', async () => {
    const richFetcher = () =>
      new FakePageFetcher({ [PAGE_URL]: { html: RICH_PAGE } });
    const wide = createService({
      pool: new WorkerPool({ size: 5 }),
      fetcher: richFetcher(),
    });
    const narrow = createService({
      pool: new WorkerPool({ size: 1, queueMax: 1 }),
      fetcher: richFetcher(),
    });

    const [fromWide, fromNarrow] = await Promise.all([
      wide.service.analyze(PAGE_URL),
      narrow.service.analyze(PAGE_URL),
    ]);

    const root = new CheerioDocumentParser().parse(RICH_PAGE).root;
    const links = countLinks(root, PAGE_URL);
    const sequential = {
      htmlVersion: extractHtmlVersion(root),
      pageTitle: extractPageTitle(root),
      headings: extractHeadings(root),
      internalLinks: links.internal,
      externalLinks: links.external,
      inaccessibleLinks: links.inaccessible,
      hasLoginForm: hasLoginForm(root),
    };

    assert.deepEqual(fromWide, fromNarrow);
    assert.deepEqual(
      {
        htmlVersion: fromWide.htmlVersion,
        pageTitle: fromWide.pageTitle,
        headings: fromWide.headings,
        internalLinks: fromWide.internalLinks,
        externalLinks: fromWide.externalLinks,
        inaccessibleLinks: fromWide.inaccessibleLinks,
        hasLoginForm: fromWide.hasLoginForm,
      },
      sequential
    );
    assert.deepEqual(sequential, {
      htmlVersion: 'HTML5 (implied)',
      pageTitle: 'Account Portal',
      headings: { h1: 1, h2: 2 },
      internalLinks: 1,
      externalLinks: 2,
      inaccessibleLinks: 1,
      hasLoginForm: true,
    });
  });

  it('passes the caller signal to the fetcher', async () => {
    const { service, fetcher } = createService();
    const controller = new AbortController();

    await service.analyze(PAGE_URL, controller.signal);

    assert.equal(fetcher.calls[0]?.options?.signal, controller.signal);
  });

  it('rejects URLs that are not http or https without fetching', async () => {
    const { service, fetcher } = createService();

    await assert.rejects(
      service.analyze('ftp://example.com'),
      (error: unknown) =>
        error instanceof AnalysisError &&
        error.statusCode === 400 &&
        error.message ===
          'Invalid protocol: ftp:. Only http: and https: are allowed' &&
        error.url === 'ftp://example.com'
    );
    assert.equal(fetcher.calls.length, 0);
  });

  it('reports non-2xx responses with their status and does not cache them', async () => {
    const { service, cache } = createService({
      fetcher: new FakePageFetcher({
        [PAGE_URL]: { status: 404, statusText: 'Not Found' },
      }),
    });

    await assert.rejects(
      service.analyze(PAGE_URL),
      isAnalysisError(
        404,
        'Not found: The page does not exist. Please check the URL.'
      )
    );
    assert.equal(cache.size, 0);
  });

  it('carries transport failures through with their code and message', async () => {
    const { service } = createService({
      fetcher: new FakePageFetcher({
        [PAGE_URL]: {
          error: new FetchError(TRANSPORT_MESSAGES.dns, PAGE_URL, 404),
        },
      }),
    });

    await assert.rejects(
      service.analyze(PAGE_URL),
      isAnalysisError(404, TRANSPORT_MESSAGES.dns)
    );
  });

  it('reports parser failures', async () => {
    const { service } = createService({
      parser: {
        parse: () => {
          throw new ParseError('Document exceeds maximum size of 8 bytes');
        },
      },
    });

    await assert.rejects(
      service.analyze(PAGE_URL),
      isAnalysisError(422, 'Document exceeds maximum size of 8 bytes')
    );
  });

  it('fails the request when any pass fails and caches nothing', async () => {
    const broken = registerPass<number>({
      name: 'broken',
      extract: () => {
        throw new Error('kaput');
      },
      merge: () => undefined,
    });
    const { service, cache } = createService({
      passes: [...DEFAULT_PASSES, broken],
    });

    await assert.rejects(
      service.analyze(PAGE_URL),
      isAnalysisError(500, 'Failed to analyze page: broken (kaput)')
    );
    assert.equal(cache.size, 0);
  });

  it('runs added passes without other changes', async () => {
    const shout = registerPass<string>({
      name: 'shout',
      extract: ({ document }) => String(document.byteLength),
      merge: (draft, value) => {
        draft.pageTitle = `${draft.pageTitle} [${value}]`;
      },
    });
    const { service } = createService({ passes: [...DEFAULT_PASSES, shout] });

    const record = await service.analyze(PAGE_URL);

    assert.equal(
      record.pageTitle,
      `Example Domain [${new TextEncoder().encode(EXAMPLE_PAGE).byteLength}]`
    );
  });

  it('still answers when the cache write fails', async () => {
    const failingCache: AnalysisCache = {
      size: 0,
      get: () => undefined,
      set: () => {
        throw new Error('disk full');
      },
    };
    const { service } = createService({ cache: failingCache });

    const record = await service.analyze(PAGE_URL);
    assert.equal(record.pageTitle, 'Example Domain');
  });

  it('reports pool and cache statistics', async () => {
    const { service } = createService();
    await service.analyze(PAGE_URL);
    await new Promise((resolve) => setImmediate(resolve));

    assert.deepEqual(service.getStatus(), {
      status: READY_STATUS,
      workers: { size: 2, active: 0, pending: 0 },
      cachedResults: 1,
    });
  });
});

describe('toAnalysisResponse', () => {
  it('uses the snake_case wire names', () => {
    assert.deepEqual(toAnalysisResponse(EXPECTED_RECORD), {
      url: PAGE_URL,
      html_version: 'HTML5 (implied)',
      page_title: 'Example Domain',
      headings: {},
      internal_links: 1,
      external_links: 1,
      inaccessible_links: 0,
      has_login_form: false,
      analyzed_at: ANALYZED_AT,
      processing_time: '150ms',
    });
  });
});
