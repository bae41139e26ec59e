import type { CrawlSummary, CrawlTermination, SitemapSeed } from '../../types.js';
import type { Frontier } from '../state/frontier.js';
import type { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  stats: CrawlStats;
  frontier: Frontier;
  sitemap: SitemapSeed;
  termination: CrawlTermination;
  startTime: number;
  now?: number;
}): CrawlSummary {
  const { stats, frontier, sitemap, termination, startTime, now = Date.now() } = options;

  return {
    pagesVisited: stats.pagesVisited,
    pagesFetched: stats.pagesFetched,
    pagesFailed: stats.pagesFailed,
    pagesSkipped: stats.pagesSkipped,
    totalExternalLinks: stats.totalExternalLinks,
    authorityLinks: stats.authorityLinks,
    nonAuthorityLinks: stats.totalExternalLinks - stats.authorityLinks,
    distinctExternalDomains: stats.externalDomains.size,
    uniqueUrlsDiscovered: frontier.uniqueCount,
    maxDepth: stats.maxDepth,
    duplicatesFiltered: stats.duplicatesFiltered,
    deferredByBudget: stats.deferredByBudget,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([status, count]) => [String(status), count]),
    ),
    failureReasons: Object.fromEntries(stats.failureReasons.entries()),
    sitemap: {
      available: sitemap.available,
      urlsFound: sitemap.urls.length,
      sitemapsRead: sitemap.sitemapsRead.length,
      ...(sitemap.error ? { error: sitemap.error } : {}),
    },
    termination,
    cancelled: termination === 'cancelled',
    startedAt: new Date(startTime).toISOString(),
    durationMs: now - startTime,
  };
}
