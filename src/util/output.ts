import { summarizeDomains } from '../crawler/reporting/domains.js';
import type { CrawlProgress, CrawlResult, CrawlSummary, OutputFormat, PageRecord } from '../types.js';

let quietMode = false;
let quietProgressLastLength = 0;

export function setOutputConfig(config: { quiet: boolean }): void {
  if (quietMode && !config.quiet) {
    flushQuietProgress();
  }
  quietMode = config.quiet;
  quietProgressLastLength = 0;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

export function writePage(page: PageRecord, progress: CrawlProgress): void {
  if (quietMode) {
    updateQuietProgress(progress);
    return;
  }

  process.stdout.write(renderPage(page));
}

export function logError(message: string): void {
  flushQuietProgress();
  process.stderr.write(message.endsWith('\n') ? message : `${message}\n`);
}

export function updateQuietProgress(progress: CrawlProgress): void {
  const line = `[quiet] visited:${progress.pagesVisited}/${progress.maxPages} failed:${progress.pagesFailed} pending:${progress.pending} external:${progress.totalExternalLinks}`;
  const padded =
    quietProgressLastLength > line.length ? line.padEnd(quietProgressLastLength, ' ') : line;
  process.stdout.write(`\r${padded}`);
  quietProgressLastLength = padded.length;
}

export function flushQuietProgress(): void {
  if (quietProgressLastLength === 0) {
    return;
  }
  process.stdout.write('\n');
  quietProgressLastLength = 0;
}

export function renderPage(page: PageRecord): string {
  const lines: string[] = [`VISITED: ${page.url}`];

  if (page.finalUrl) {
    lines.push(`  -> redirected to ${page.finalUrl}`);
  }

  if (page.status === 'failed') {
    lines.push(`  ! FAILED: ${page.fetchError?.message ?? 'unknown error'}`);
  } else if (page.status === 'skipped') {
    lines.push(`  ~ SKIPPED: ${page.skipReason ?? 'not an HTML document'}`);
  }

  for (const link of page.externalLinks) {
    const tag = link.isAuthority ? 'authority' : 'external';
    const anchor = link.anchorText ? ` "${link.anchorText}"` : '';
    const rel = link.rel.length > 0 ? ` (rel: ${link.rel.join(' ')})` : '';
    lines.push(`  - [${tag}] ${link.targetUrl}${anchor}${rel}`);
  }

  return `${lines.join('\n')}\n`;
}

export function renderSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Pages visited: ${summary.pagesVisited}`,
    `Pages fetched: ${summary.pagesFetched}`,
    `Pages failed: ${summary.pagesFailed}`,
    `Pages skipped: ${summary.pagesSkipped}`,
    `External links: ${summary.totalExternalLinks} (authority: ${summary.authorityLinks}, other: ${summary.nonAuthorityLinks})`,
    `Distinct external domains: ${summary.distinctExternalDomains}`,
    `Unique URLs discovered: ${summary.uniqueUrlsDiscovered}`,
    `Max depth: ${summary.maxDepth}`,
    `Deferred by page budget: ${summary.deferredByBudget}`,
    `Sitemap: ${summary.sitemap.available ? `${summary.sitemap.urlsFound} URLs` : 'unavailable'}`,
    `Termination: ${summary.termination}`,
    `Duration: ${formatDuration(summary.durationMs)}`,
  ];

  const failureEntries = Object.entries(summary.failureReasons).sort(
    ([reasonA, countA], [reasonB, countB]) => countB - countA || reasonA.localeCompare(reasonB),
  );

  if (failureEntries.length > 0) {
    lines.push('Failure reasons:');
    for (const [reason, count] of failureEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function renderDomains(result: CrawlResult): string {
  const domains = summarizeDomains(result.pages.values());
  if (domains.length === 0) {
    return '';
  }

  const lines = ['', '--- External Domains ---'];
  for (const entry of domains) {
    const marker = entry.isAuthority ? ' [authority]' : '';
    lines.push(
      `  ${entry.domain}${marker}: ${entry.linkCount} link(s) from ${entry.referringPages.length} page(s)`,
    );
  }

  return `${lines.join('\n')}\n`;
}

export function renderJson(result: CrawlResult): string {
  const payload = {
    rootUrl: result.rootUrl,
    summary: result.summary,
    pages: Object.fromEntries(result.pages),
    domains: summarizeDomains(result.pages.values()),
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export function renderResult(result: CrawlResult, format: OutputFormat): string {
  if (format === 'json') {
    return renderJson(result);
  }
  return `${renderSummary(result.summary)}${renderDomains(result)}`;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    return `${seconds.toFixed(seconds >= 10 ? 1 : 2)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}
