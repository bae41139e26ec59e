import type { PageFailure, PageRecord } from '../../types.js';

export interface CrawlStats {
  pagesVisited: number;
  pagesFetched: number;
  pagesFailed: number;
  pagesSkipped: number;
  maxDepth: number;
  totalExternalLinks: number;
  authorityLinks: number;
  duplicatesFiltered: number;
  deferredByBudget: number;
  responsesReceived: number;
  statusCounts: Map<number, number>;
  failureReasons: Map<string, number>;
  externalDomains: Set<string>;
}

export function initializeStats(): CrawlStats {
  return {
    pagesVisited: 0,
    pagesFetched: 0,
    pagesFailed: 0,
    pagesSkipped: 0,
    maxDepth: 0,
    totalExternalLinks: 0,
    authorityLinks: 0,
    duplicatesFiltered: 0,
    deferredByBudget: 0,
    responsesReceived: 0,
    statusCounts: new Map<number, number>(),
    failureReasons: new Map<string, number>(),
    externalDomains: new Set<string>(),
  };
}

export function recordPageMetrics(stats: CrawlStats, page: PageRecord): void {
  stats.pagesVisited += 1;
  stats.maxDepth = Math.max(stats.maxDepth, page.depth);

  switch (page.status) {
    case 'fetched':
      stats.pagesFetched += 1;
      break;
    case 'skipped':
      stats.pagesSkipped += 1;
      break;
    case 'failed':
      stats.pagesFailed += 1;
      if (page.fetchError) {
        increment(stats.failureReasons, failureKey(page.fetchError));
      }
      break;
  }

  if (typeof page.httpStatus === 'number') {
    stats.responsesReceived += 1;
    increment(stats.statusCounts, page.httpStatus);
  }

  for (const link of page.externalLinks) {
    stats.totalExternalLinks += 1;
    stats.externalDomains.add(link.targetDomain);
    if (link.isAuthority) {
      stats.authorityLinks += 1;
    }
  }
}

/** `timeout`, `connection`, `parse`, or `http:<status>`. */
export function failureKey(failure: PageFailure): string {
  return failure.reason === 'http' && failure.statusCode !== undefined
    ? `http:${failure.statusCode}`
    : failure.reason;
}

function increment<K>(map: Map<K, number>, key: K): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}
