import { load } from 'cheerio';

import { createSitemapError } from '../../errors.js';
import type { SitemapSeed } from '../../types.js';
import { reportCrawlerError } from '../../util/errorHandler.js';
import { isCrawlable } from '../url/crawlable.js';
import { normalizeUrl } from '../url/normalizeUrl.js';
import { isInternal, type SiteScopeOptions } from '../url/siteScope.js';
import { fetchDocument, type FetchDocumentOptions } from './fetchDocument.js';
import type { RequestPacer } from './pacer.js';

export type ParsedSitemap =
  | { kind: 'index'; sitemaps: string[] }
  | { kind: 'urlset'; urls: string[] }
  | { kind: 'invalid' };

export interface SeedOptions extends SiteScopeOptions {
  fetch: Omit<FetchDocumentOptions, 'acceptContentTypes' | 'accept'>;
  pacer: RequestPacer;
  maxDepth?: number;
  /** Checked before every sitemap request. */
  shouldStop?: () => boolean;
}

export const SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml'] as const;

const XML_CONTENT_TYPES = ['application/xml', 'text/xml'] as const;
const DEFAULT_MAX_DEPTH = 3;

export function parseSitemapXml(xml: string): ParsedSitemap {
  const $ = load(xml, { xml: true });
  const locs = (selector: string): string[] =>
    $(selector)
      .map((_idx, element) => $(element).text().trim())
      .get()
      .filter((loc) => loc.length > 0);

  if ($('sitemapindex').length > 0) {
    return { kind: 'index', sitemaps: locs('sitemapindex > sitemap > loc') };
  }

  if ($('urlset').length > 0) {
    return { kind: 'urlset', urls: locs('urlset > url > loc') };
  }

  return { kind: 'invalid' };
}

/**
 * Collects page URLs from the site's sitemap(s), following sitemap indexes up
 * to `maxDepth` levels. Any failure degrades to `available: false`.
 */
export async function seedFromSitemap(rootUrl: string, options: SeedOptions): Promise<SitemapSeed & { responded: boolean }> {
  const root = new URL(rootUrl);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const visitedSitemaps = new Set<string>();
  const urls = new Set<string>();
  const sitemapsRead: string[] = [];
  const problems: string[] = [];
  let responded = false;
  let stopped = false;

  const readSitemap = async (sitemapUrl: string, depth: number): Promise<void> => {
    if (stopped || visitedSitemaps.has(sitemapUrl)) {
      return;
    }
    if (options.shouldStop?.() === true) {
      stopped = true;
      problems.push('Sitemap discovery cancelled');
      return;
    }
    visitedSitemaps.add(sitemapUrl);

    await options.pacer.wait();
    const outcome = await fetchDocument(sitemapUrl, {
      ...options.fetch,
      accept: 'application/xml,text/xml;q=0.9,*/*;q=0.5',
      acceptContentTypes: XML_CONTENT_TYPES,
    });

    if (outcome.kind !== 'failed' || outcome.status !== null) {
      responded = true;
    }

    if (outcome.kind === 'failed') {
      problems.push(`${sitemapUrl}: ${outcome.failure.message}`);
      return;
    }

    if (outcome.kind === 'skipped') {
      problems.push(`${sitemapUrl}: ${outcome.reason}`);
      return;
    }

    const parsed = parseSitemapXml(outcome.body);
    if (parsed.kind === 'invalid') {
      problems.push(`${sitemapUrl}: not a sitemap document`);
      return;
    }

    sitemapsRead.push(sitemapUrl);

    if (parsed.kind === 'urlset') {
      for (const loc of parsed.urls) {
        const normalized = normalizeUrl(loc, root);
        if (normalized && isInternal(normalized, root.hostname, options) && isCrawlable(normalized)) {
          urls.add(normalized);
        }
      }
      return;
    }

    if (depth >= maxDepth) {
      problems.push(`${sitemapUrl}: nested sitemaps beyond depth ${maxDepth} ignored`);
      return;
    }

    for (const child of parsed.sitemaps) {
      const childUrl = normalizeUrl(child, root);
      if (childUrl) {
        await readSitemap(childUrl, depth + 1);
      }
    }
  };

  for (const path of SITEMAP_PATHS) {
    const candidate = normalizeUrl(path, root.origin);
    if (candidate) {
      await readSitemap(candidate, 1);
    }
  }

  const available = sitemapsRead.length > 0;
  const error = available ? undefined : problems.join('; ') || 'No sitemap found';

  if (!available) {
    reportCrawlerError(createSitemapError('Sitemap unavailable; falling back to spidering', { reason: error }), {
      stage: 'sitemap',
      url: root.origin,
    });
  }

  return { available, urls: [...urls], sitemapsRead, error, responded };
}
