import { createFetchError, ensureCrawlerError } from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';
import type {
  CrawlConfig,
  CrawlHandlers,
  CrawlProgress,
  CrawlResult,
  CrawlTermination,
  FrontierItem,
  PageRecord,
  SitemapSeed,
} from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import type { FetchDocumentOptions, FetchOutcome } from './network/fetchDocument.js';
import { fetchDocument } from './network/fetchDocument.js';
import { RequestPacer, type PacerClock } from './network/pacer.js';
import { seedFromSitemap } from './network/sitemap.js';
import { parsePage, type ParseContext } from './parsing/parsePage.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { Frontier } from './state/frontier.js';
import { initializeStats, recordPageMetrics, type CrawlStats } from './state/stats.js';
import { normalizeUrl } from './url/normalizeUrl.js';

export interface CrawlRuntimeOptions {
  config: CrawlConfig;
  handlers?: CrawlHandlers;
  signal?: AbortSignal;
  clock?: PacerClock;
}

const UNAVAILABLE_SITEMAP: SitemapSeed = {
  available: false,
  urls: [],
  sitemapsRead: [],
  error: 'Sitemap discovery disabled',
};

/**
 * Owns the frontier, the seen-set and the result map for one run. Pages are
 * fetched strictly one at a time, FIFO, with the configured spacing between
 * requests. A failing page becomes a `failed` record and the loop moves on.
 */
class CrawlEngine {
  private readonly frontier = new Frontier();
  private readonly stats: CrawlStats = initializeStats();
  private readonly pages = new Map<string, PageRecord>();
  /** Requested and landing URLs of every response already parsed. */
  private readonly parsedUrls = new Set<string>();
  private readonly pacer: RequestPacer;
  private readonly logger: LoggerLike;
  private readonly rootUrl: URL;
  private readonly parseContext: ParseContext;
  private readonly fetchOptions: FetchDocumentOptions;
  private readonly startTime = Date.now();
  private sitemapResponded = false;
  private dequeued = 0;

  constructor(
    private readonly config: CrawlConfig,
    private readonly handlers: CrawlHandlers,
    private readonly signal: AbortSignal | undefined,
    clock: PacerClock | undefined,
  ) {
    this.rootUrl = new URL(config.rootUrl);
    this.pacer = new RequestPacer(Math.round(config.delaySeconds * 1_000), clock);
    this.logger = getLogger('crawl');
    this.parseContext = {
      rootHost: this.rootUrl.hostname,
      authorityRules: config.authorityRules,
      wwwEquivalence: config.wwwEquivalence,
    };
    this.fetchOptions = {
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      maxRetries: config.maxRetries,
    };
  }

  async run(): Promise<CrawlResult> {
    this.logger.info({ rootUrl: this.config.rootUrl, maxPages: this.config.maxPages }, 'crawl started');

    const sitemap = await this.seed();
    const termination = await this.drain();

    if (this.stats.pagesVisited > 0 && this.stats.responsesReceived === 0 && !this.sitemapResponded) {
      reportCrawlerError(
        createFetchError(
          `Unable to reach ${this.rootUrl.origin}`,
          { url: this.config.rootUrl, pagesAttempted: this.stats.pagesVisited },
          { severity: 'fatal' },
        ),
        { stage: 'crawl' },
      );
    }

    const summary = buildCrawlSummary({
      stats: this.stats,
      frontier: this.frontier,
      sitemap,
      termination,
      startTime: this.startTime,
    });

    this.logger.info(
      {
        pagesVisited: summary.pagesVisited,
        pagesFailed: summary.pagesFailed,
        externalLinks: summary.totalExternalLinks,
        termination,
      },
      'crawl finished',
    );

    return { rootUrl: this.config.rootUrl, pages: this.pages, summary };
  }

  private async seed(): Promise<SitemapSeed> {
    this.frontier.enqueueIfNew(this.config.rootUrl, 0);

    if (!this.config.useSitemap) {
      return UNAVAILABLE_SITEMAP;
    }

    const { responded, ...seed } = await seedFromSitemap(this.config.rootUrl, {
      fetch: this.fetchOptions,
      pacer: this.pacer,
      maxDepth: this.config.sitemapMaxDepth,
      wwwEquivalence: this.config.wwwEquivalence,
      shouldStop: () => this.isCancelled(),
    });
    this.sitemapResponded = responded;

    for (const url of seed.urls) {
      this.offer(url, 0);
    }

    this.logger.debug(
      { available: seed.available, urls: seed.urls.length, pending: this.frontier.pending },
      'sitemap seeding done',
    );
    this.handlers.onSitemap?.(seed);

    return seed;
  }

  private async drain(): Promise<CrawlTermination> {
    while (this.dequeued < this.config.maxPages && this.frontier.pending > 0) {
      if (this.isCancelled()) {
        return 'cancelled';
      }

      const next = this.frontier.dequeue();
      if (!next) {
        break;
      }

      this.dequeued += 1;
      const record = await this.visit(next);
      this.pages.set(next.url, record);
      recordPageMetrics(this.stats, record);
      this.dispatchPage(record);
    }

    return this.frontier.pending > 0 || this.stats.deferredByBudget > 0
      ? 'budget-exhausted'
      : 'frontier-exhausted';
  }

  private isCancelled(): boolean {
    return this.signal?.aborted === true || this.handlers.shouldStop?.() === true;
  }

  /** Enqueues a newly discovered URL while the page budget still has room for it. */
  private offer(url: string, depth: number): void {
    if (this.frontier.has(url)) {
      this.stats.duplicatesFiltered += 1;
      return;
    }

    if (this.dequeued + this.frontier.pending >= this.config.maxPages) {
      this.stats.deferredByBudget += 1;
      return;
    }

    this.frontier.enqueueIfNew(url, depth);
  }

  private async visit(item: FrontierItem): Promise<PageRecord> {
    await this.pacer.wait();
    this.logger.debug({ url: item.url, depth: item.depth }, 'fetching page');

    const outcome = await fetchDocument(item.url, this.fetchOptions);
    const finalUrl = this.trackRedirect(item.url, outcome);
    const base = { url: item.url, depth: item.depth, finalUrl, elapsedMs: outcome.elapsedMs };

    if (outcome.kind === 'failed') {
      reportCrawlerError(createFetchError(outcome.failure.message, { failure: outcome.failure.reason }), {
        stage: 'fetch',
        url: item.url,
      });
      const failed: PageRecord = {
        ...base,
        status: 'failed',
        externalLinks: [],
        fetchError: outcome.failure,
        httpStatus: outcome.status ?? undefined,
      };
      return Object.freeze(failed);
    }

    if (outcome.kind === 'skipped') {
      const skipped: PageRecord = {
        ...base,
        status: 'skipped',
        externalLinks: [],
        httpStatus: outcome.status,
        contentType: outcome.contentType,
        skipReason: outcome.reason,
      };
      return Object.freeze(skipped);
    }

    // The landing page was already parsed under another URL; its links are counted there.
    if (finalUrl && this.parsedUrls.has(finalUrl)) {
      const duplicate: PageRecord = {
        ...base,
        status: 'fetched',
        externalLinks: [],
        httpStatus: outcome.status,
        contentType: outcome.contentType,
      };
      return Object.freeze(duplicate);
    }
    this.parsedUrls.add(item.url);
    if (finalUrl) {
      this.parsedUrls.add(finalUrl);
    }

    let record: PageRecord;
    try {
      const parsed = parsePage(finalUrl ?? item.url, outcome.body, this.parseContext);
      for (const link of parsed.internalLinks) {
        this.offer(link, item.depth + 1);
      }

      record = {
        ...base,
        status: 'fetched',
        externalLinks: Object.freeze(parsed.externalLinks),
        httpStatus: outcome.status,
        contentType: outcome.contentType,
        title: parsed.title,
      };
    } catch (error) {
      const crawlerError = reportCrawlerError(
        ensureCrawlerError(error, { kind: 'parse', severity: 'recoverable' }),
        { stage: 'parse', url: item.url },
        { throwOnFatal: false },
      );
      record = {
        ...base,
        status: 'failed',
        externalLinks: [],
        fetchError: { reason: 'parse', message: crawlerError.message },
        httpStatus: outcome.status,
        contentType: outcome.contentType,
      };
    }

    return Object.freeze(record);
  }

  // Redirect targets join the seen-set so a later link to them is not refetched.
  private trackRedirect(requested: string, outcome: FetchOutcome): string | undefined {
    const landed = normalizeUrl(outcome.url, requested);
    if (!landed || landed === requested) {
      return undefined;
    }

    this.frontier.markSeen(landed);
    return landed;
  }

  private dispatchPage(record: PageRecord): void {
    if (!this.handlers.onPage) {
      return;
    }

    const progress: CrawlProgress = {
      pagesVisited: this.stats.pagesVisited,
      pagesFailed: this.stats.pagesFailed,
      pending: this.frontier.pending,
      totalExternalLinks: this.stats.totalExternalLinks,
      maxPages: this.config.maxPages,
    };

    try {
      this.handlers.onPage(record, progress);
    } catch (error) {
      reportCrawlerError(error, { stage: 'onPage', url: record.url }, {
        defaultKind: 'output',
        defaultSeverity: 'recoverable',
      });
    }
  }
}

export async function crawl({ config, handlers = {}, signal, clock }: CrawlRuntimeOptions): Promise<CrawlResult> {
  const engine = new CrawlEngine(config, handlers, signal, clock);
  return engine.run();
}
