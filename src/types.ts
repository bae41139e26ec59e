export type OutputFormat = 'text' | 'json';

export type PageStatus = 'fetched' | 'failed' | 'skipped';

export type FetchFailureReason = 'timeout' | 'connection' | 'http';

export type DomainClass = 'authority' | 'non-authority';

export type CrawlTermination = 'frontier-exhausted' | 'budget-exhausted' | 'cancelled';

export interface AuthorityRules {
  /** Matched against the end of the hostname on a label boundary, e.g. `gov`. */
  tldSuffixes: string[];
  /** Matched exactly or as a parent domain, e.g. `wikipedia.org`. */
  domains: string[];
  /** Substrings looked for in the registrable label, e.g. `bbc` of `www.bbc.co.uk`. */
  keywords: string[];
}

export interface AuthorityRulesOverride extends Partial<AuthorityRules> {
  replace?: boolean;
}

export type PageFailureReason = FetchFailureReason | 'parse';

export interface PageFailure {
  reason: PageFailureReason;
  message: string;
  statusCode?: number;
}

export interface LinkRecord {
  readonly sourcePage: string;
  readonly targetUrl: string;
  readonly anchorText: string;
  readonly rel: readonly string[];
  readonly targetDomain: string;
  readonly isAuthority: boolean;
}

export interface PageRecord {
  readonly url: string;
  /** Link hops from the root URL; sitemap-seeded pages are at depth 0. */
  readonly depth: number;
  readonly status: PageStatus;
  readonly externalLinks: readonly LinkRecord[];
  readonly fetchError?: PageFailure;
  readonly httpStatus?: number;
  readonly finalUrl?: string;
  readonly contentType?: string;
  readonly title?: string;
  readonly elapsedMs?: number;
  readonly skipReason?: string;
}

export interface DomainStats {
  domain: string;
  linkCount: number;
  isAuthority: boolean;
  referringPages: string[];
}

export interface CrawlConfig {
  rootUrl: string;
  maxPages: number;
  delaySeconds: number;
  authorityRules: AuthorityRules;
  timeoutMs: number;
  wwwEquivalence: boolean;
  useSitemap: boolean;
  sitemapMaxDepth: number;
  maxRetries: number;
  userAgent: string;
}

export interface CrawlConfigInput
  extends Partial<Omit<CrawlConfig, 'rootUrl' | 'authorityRules'>> {
  rootUrl: string;
  authorityRules?: AuthorityRulesOverride;
}

export interface SitemapSeed {
  available: boolean;
  urls: string[];
  sitemapsRead: string[];
  error?: string;
}

export interface SitemapSummary {
  available: boolean;
  urlsFound: number;
  sitemapsRead: number;
  error?: string;
}

export interface CrawlSummary {
  pagesVisited: number;
  pagesFetched: number;
  pagesFailed: number;
  pagesSkipped: number;
  totalExternalLinks: number;
  authorityLinks: number;
  nonAuthorityLinks: number;
  distinctExternalDomains: number;
  uniqueUrlsDiscovered: number;
  maxDepth: number;
  duplicatesFiltered: number;
  deferredByBudget: number;
  statusCounts: Record<string, number>;
  failureReasons: Record<string, number>;
  sitemap: SitemapSummary;
  termination: CrawlTermination;
  cancelled: boolean;
  startedAt: string;
  durationMs: number;
}

export interface CrawlResult {
  rootUrl: string;
  pages: Map<string, PageRecord>;
  summary: CrawlSummary;
}

export interface CrawlProgress {
  pagesVisited: number;
  pagesFailed: number;
  pending: number;
  totalExternalLinks: number;
  maxPages: number;
}

export interface CrawlHandlers {
  onPage?(page: PageRecord, progress: CrawlProgress): void;
  onSitemap?(seed: SitemapSeed): void;
  /** Polled between pages; returning true ends the crawl with a partial result. */
  shouldStop?(): boolean;
}

export interface RunCrawlOptions {
  handlers?: CrawlHandlers;
  signal?: AbortSignal;
}

export interface FrontierItem {
  url: string;
  depth: number;
}
