import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createDefaultHandlers } from '../src/crawler/handlers/defaultHandlers.js';
import type { CrawlResult, CrawlSummary, LinkRecord, PageRecord } from '../src/types.js';
import {
  flushQuietProgress,
  formatDuration,
  logError,
  renderDomains,
  renderJson,
  renderPage,
  renderResult,
  renderSummary,
  resetOutputConfig,
  setOutputConfig,
  writePage,
} from '../src/util/output.js';

const link = (sourcePage: string, overrides: Partial<LinkRecord>): LinkRecord => ({
  sourcePage,
  targetUrl: 'https://spamlink.com/',
  anchorText: '',
  rel: [],
  targetDomain: 'spamlink.com',
  isAuthority: false,
  ...overrides,
});

const home: PageRecord = {
  url: 'https://example.com/',
  depth: 0,
  status: 'fetched',
  externalLinks: [
    link('https://example.com/', {
      targetUrl: 'https://www.irs.gov/page',
      anchorText: 'IRS guidance',
      rel: ['nofollow'],
      targetDomain: 'irs.gov',
      isAuthority: true,
    }),
    link('https://example.com/', {}),
  ],
};

const about: PageRecord = {
  url: 'https://example.com/about',
  depth: 1,
  status: 'fetched',
  externalLinks: [link('https://example.com/about', { anchorText: 'Deals' })],
};

const summary: CrawlSummary = {
  pagesVisited: 3,
  pagesFetched: 2,
  pagesFailed: 1,
  pagesSkipped: 0,
  totalExternalLinks: 3,
  authorityLinks: 1,
  nonAuthorityLinks: 2,
  distinctExternalDomains: 2,
  uniqueUrlsDiscovered: 4,
  maxDepth: 1,
  duplicatesFiltered: 1,
  deferredByBudget: 0,
  statusCounts: { '200': 2, '500': 1 },
  failureReasons: { 'http:500': 1, timeout: 2 },
  sitemap: { available: true, urlsFound: 4, sitemapsRead: 1 },
  termination: 'frontier-exhausted',
  cancelled: false,
  startedAt: '2024-01-01T00:00:00.000Z',
  durationMs: 1_500,
};

const result: CrawlResult = {
  rootUrl: 'https://example.com/',
  pages: new Map([
    [home.url, home],
    [about.url, about],
  ]),
  summary,
};

describe('renderPage', () => {
  it('lists each external link with its classification', () => {
    expect(renderPage(home)).toBe(
      [
        'VISITED: https://example.com/',
        '  - [authority] https://www.irs.gov/page "IRS guidance" (rel: nofollow)',
        '  - [external] https://spamlink.com/',
        '',
      ].join('\n'),
    );
  });

  it('shows redirects and failures', () => {
    const page: PageRecord = {
      url: 'https://example.com/old',
      depth: 1,
      status: 'failed',
      finalUrl: 'https://example.com/new',
      externalLinks: [],
      fetchError: { reason: 'http', statusCode: 404, message: 'HTTP 404' },
    };

    expect(renderPage(page)).toBe(
      'VISITED: https://example.com/old\n  -> redirected to https://example.com/new\n  ! FAILED: HTTP 404\n',
    );
  });

  it('shows why a page was skipped', () => {
    const page: PageRecord = {
      url: 'https://example.com/feed',
      depth: 1,
      status: 'skipped',
      externalLinks: [],
      skipReason: 'Unsupported content type: text/plain',
    };

    expect(renderPage(page)).toBe(
      'VISITED: https://example.com/feed\n  ~ SKIPPED: Unsupported content type: text/plain\n',
    );
  });
});

describe('renderSummary', () => {
  it('prints totals and failure reasons by frequency', () => {
    expect(renderSummary(summary)).toBe(
      [
        '',
        '--- Crawl Summary ---',
        'Pages visited: 3',
        'Pages fetched: 2',
        'Pages failed: 1',
        'Pages skipped: 0',
        'External links: 3 (authority: 1, other: 2)',
        'Distinct external domains: 2',
        'Unique URLs discovered: 4',
        'Max depth: 1',
        'Deferred by page budget: 0',
        'Sitemap: 4 URLs',
        'Termination: frontier-exhausted',
        'Duration: 1.50s',
        'Failure reasons:',
        '  timeout: 2',
        '  http:500: 1',
        '',
      ].join('\n'),
    );
  });

  it('reports an unavailable sitemap', () => {
    const rendered = renderSummary({ ...summary, sitemap: { available: false, urlsFound: 0, sitemapsRead: 0 } });

    expect(rendered.split('\n')).toContain('Sitemap: unavailable');
  });
});

describe('renderDomains', () => {
  it('groups links by domain, most linked first', () => {
    expect(renderDomains(result)).toBe(
      [
        '',
        '--- External Domains ---',
        '  spamlink.com: 2 link(s) from 2 page(s)',
        '  irs.gov [authority]: 1 link(s) from 1 page(s)',
        '',
      ].join('\n'),
    );
  });

  it('prints nothing without external links', () => {
    expect(renderDomains({ ...result, pages: new Map() })).toBe('');
  });
});

describe('renderJson', () => {
  it('serialises pages keyed by URL with the domain breakdown', () => {
    const parsed: unknown = JSON.parse(renderJson(result));

    expect(parsed).toMatchObject({
      rootUrl: 'https://example.com/',
      summary: { pagesVisited: 3, termination: 'frontier-exhausted' },
      pages: {
        'https://example.com/': { status: 'fetched' },
        'https://example.com/about': { status: 'fetched' },
      },
      domains: [
        { domain: 'spamlink.com', linkCount: 2, isAuthority: false },
        { domain: 'irs.gov', linkCount: 1, isAuthority: true },
      ],
    });
  });

  it('is what renderResult produces for the json format', () => {
    expect(renderResult(result, 'json')).toBe(renderJson(result));
    expect(renderResult(result, 'text')).toBe(`${renderSummary(summary)}${renderDomains(result)}`);
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0ms'],
    [250.4, '250ms'],
    [1_500, '1.50s'],
    [12_345, '12.3s'],
    [125_000, '2m 5s'],
  ])('formats %d ms as %s', (durationMs, expected) => {
    expect(formatDuration(durationMs)).toBe(expected);
  });
});

describe('console output', () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    resetOutputConfig();
    vi.restoreAllMocks();
  });

  it('prints each page in normal mode', () => {
    writePage(home, { pagesVisited: 1, pagesFailed: 0, pending: 0, totalExternalLinks: 2, maxPages: 10 });

    expect(stdout).toEqual([renderPage(home)]);
  });

  it('rewrites a single progress line in quiet mode', () => {
    setOutputConfig({ quiet: true });

    writePage(home, { pagesVisited: 1, pagesFailed: 0, pending: 12, totalExternalLinks: 3, maxPages: 10 });
    writePage(about, { pagesVisited: 2, pagesFailed: 0, pending: 2, totalExternalLinks: 3, maxPages: 10 });
    flushQuietProgress();

    expect(stdout).toEqual([
      '\r[quiet] visited:1/10 failed:0 pending:12 external:3',
      '\r[quiet] visited:2/10 failed:0 pending:2 external:3 ',
      '\n',
    ]);
  });

  it('ends the progress line before writing to stderr', () => {
    setOutputConfig({ quiet: true });

    writePage(home, { pagesVisited: 1, pagesFailed: 0, pending: 0, totalExternalLinks: 2, maxPages: 10 });
    logError('[cancel] stopping after the current page');

    expect(stdout.at(-1)).toBe('\n');
    expect(stderr).toEqual(['[cancel] stopping after the current page\n']);
  });

  it('uses per-page output only for the text format', () => {
    expect(createDefaultHandlers('text').onPage).toBe(writePage);
    expect(createDefaultHandlers('json').onPage).toBeUndefined();
  });

  it('announces a sitemap fallback on stderr', () => {
    createDefaultHandlers('text').onSitemap?.({ available: false, urls: [], sitemapsRead: [], error: 'HTTP 404' });

    expect(stderr).toEqual(['[sitemap] unavailable, spidering from the root URL (HTTP 404)\n']);
  });
});
