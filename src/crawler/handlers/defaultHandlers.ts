import type { CrawlHandlers, OutputFormat } from '../../types.js';
import { logError, writePage } from '../../util/output.js';

/**
 * Console handlers for the CLI. JSON runs print nothing per page so that
 * stdout carries a single document.
 */
export function createDefaultHandlers(format: OutputFormat): CrawlHandlers {
  return {
    onPage: format === 'text' ? writePage : undefined,
    onSitemap: (seed) => {
      if (!seed.available) {
        logError(`[sitemap] unavailable, spidering from the root URL (${seed.error ?? 'no sitemap'})`);
      }
    },
  };
}
