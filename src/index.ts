import { crawl } from './crawler/crawl.js';
import { DEFAULT_AUTHORITY_RULES, mergeAuthorityRules } from './crawler/classify/classifyDomain.js';
import { DEFAULT_USER_AGENT } from './crawler/network/fetchPage.js';
import type { PacerClock } from './crawler/network/pacer.js';
import { normalizeUrl } from './crawler/url/normalizeUrl.js';
import { createConfigurationError } from './errors.js';
import type { CrawlConfig, CrawlConfigInput, CrawlResult, RunCrawlOptions } from './types.js';

export const DEFAULT_CRAWL_CONFIG: Omit<CrawlConfig, 'rootUrl'> = {
  maxPages: 500,
  delaySeconds: 0.3,
  authorityRules: DEFAULT_AUTHORITY_RULES,
  timeoutMs: 15_000,
  wwwEquivalence: true,
  useSitemap: true,
  sitemapMaxDepth: 3,
  maxRetries: 1,
  userAgent: DEFAULT_USER_AGENT,
};

/**
 * Crawls `config.rootUrl` and resolves with every visited page keyed by its
 * canonical URL. Individual page failures are part of the result; the
 * promise only rejects for an invalid configuration or an unreachable host.
 */
export async function runCrawl(
  config: CrawlConfigInput,
  options: RunCrawlOptions & { clock?: PacerClock } = {},
): Promise<CrawlResult> {
  const resolved = resolveCrawlConfig(config);
  return crawl({ config: resolved, handlers: options.handlers, signal: options.signal, clock: options.clock });
}

export function resolveCrawlConfig(input: CrawlConfigInput): CrawlConfig {
  const defaults = DEFAULT_CRAWL_CONFIG;

  return Object.freeze({
    rootUrl: validateRootUrl(input.rootUrl),
    maxPages: coercePositiveInteger(input.maxPages ?? defaults.maxPages, 'max-pages'),
    delaySeconds: coerceNonNegativeNumber(input.delaySeconds ?? defaults.delaySeconds, 'delay'),
    authorityRules: mergeAuthorityRules(defaults.authorityRules, input.authorityRules),
    timeoutMs: coercePositiveInteger(input.timeoutMs ?? defaults.timeoutMs, 'timeout-ms'),
    wwwEquivalence: input.wwwEquivalence ?? defaults.wwwEquivalence,
    useSitemap: input.useSitemap ?? defaults.useSitemap,
    sitemapMaxDepth: coercePositiveInteger(
      input.sitemapMaxDepth ?? defaults.sitemapMaxDepth,
      'sitemap-depth',
    ),
    maxRetries: coerceNonNegativeInteger(input.maxRetries ?? defaults.maxRetries, 'max-retries'),
    userAgent: input.userAgent ?? defaults.userAgent,
  });
}

/** Accepts `example.com` as shorthand for `https://example.com`. */
export function validateRootUrl(rootUrl: string): string {
  const trimmed = rootUrl.trim();
  if (!trimmed) {
    throw createConfigurationError('A root URL is required.', { rootUrl });
  }

  const candidate = /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw createConfigurationError(`Invalid URL: ${rootUrl}`, { rootUrl });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('Root URL must use http or https protocol.', {
      protocol: url.protocol,
      rootUrl,
    });
  }

  const normalized = normalizeUrl(url.href, url);
  if (!normalized) {
    throw createConfigurationError('Unable to normalize the root URL.', { rootUrl });
  }

  return normalized;
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 1) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeNumber(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive number.`, { value, field });
  }

  return value;
}

export { classifyDomain, isAuthorityDomain, DEFAULT_AUTHORITY_RULES } from './crawler/classify/classifyDomain.js';
export { normalizeUrl } from './crawler/url/normalizeUrl.js';
export { isInternal } from './crawler/url/siteScope.js';
export { parsePage } from './crawler/parsing/parsePage.js';
export { seedFromSitemap } from './crawler/network/sitemap.js';
export { fetchDocument } from './crawler/network/fetchDocument.js';
export { summarizeDomains } from './crawler/reporting/domains.js';
export { CrawlerError, isCrawlerError } from './errors.js';
export type * from './types.js';
