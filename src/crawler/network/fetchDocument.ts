import { ensureCrawlerError } from '../../errors.js';
import type { PageFailure } from '../../types.js';
import { failureOf, fetchPage, isRetryableFetchError, type FetchPageOptions } from './fetchPage.js';

export interface FetchDocumentOptions extends FetchPageOptions {
  maxRetries?: number;
  /** Content types accepted as a document; anything else is skipped. */
  acceptContentTypes?: readonly string[];
  retryBackoffMs?: number;
}

export type FetchOutcome =
  | {
      kind: 'fetched';
      url: string;
      status: number;
      contentType?: string;
      body: string;
      elapsedMs: number;
    }
  | {
      kind: 'skipped';
      url: string;
      status: number;
      contentType?: string;
      reason: string;
      elapsedMs: number;
    }
  | {
      kind: 'failed';
      url: string;
      status: number | null;
      failure: PageFailure;
      elapsedMs: number;
    };

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'] as const;
const DEFAULT_RETRY_BACKOFF_MS = 100;

/**
 * GETs `url` and sorts the response into fetched, skipped (non-document
 * content type) or failed. Never throws: network faults come back as
 * `failed` outcomes with a timeout or connection reason.
 */
export async function fetchDocument(url: string, options: FetchDocumentOptions): Promise<FetchOutcome> {
  const maxRetries = Math.max(0, options.maxRetries ?? 1);
  const accepted = options.acceptContentTypes ?? HTML_CONTENT_TYPES;
  const backoff = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
  const startedAt = performance.now();
  const elapsed = (): number => Math.round(performance.now() - startedAt);

  for (let attempt = 0; ; attempt += 1) {
    let response: Response;
    try {
      response = await fetchPage(url, options);
    } catch (error) {
      if (attempt < maxRetries && isRetryableFetchError(error)) {
        await delay(backoff * (attempt + 1));
        continue;
      }

      const crawlerError = ensureCrawlerError(error, { kind: 'fetch', severity: 'recoverable' });
      return {
        kind: 'failed',
        url,
        status: null,
        failure: { reason: failureOf(crawlerError), message: crawlerError.message },
        elapsedMs: elapsed(),
      };
    }

    return classifyResponse(url, response, accepted, elapsed);
  }
}

async function classifyResponse(
  requestedUrl: string,
  response: Response,
  accepted: readonly string[],
  elapsed: () => number,
): Promise<FetchOutcome> {
  const finalUrl = response.url || requestedUrl;
  const contentType = response.headers.get('content-type') ?? undefined;

  if (response.status >= 400) {
    await discardBody(response);
    return {
      kind: 'failed',
      url: finalUrl,
      status: response.status,
      failure: {
        reason: 'http',
        statusCode: response.status,
        message: `HTTP ${response.status}`,
      },
      elapsedMs: elapsed(),
    };
  }

  const mediaType = contentType?.split(';')[0]?.trim().toLowerCase();
  if (!mediaType || !accepted.includes(mediaType)) {
    await discardBody(response);
    return {
      kind: 'skipped',
      url: finalUrl,
      status: response.status,
      contentType,
      reason: `Unsupported content type: ${mediaType ?? 'none'}`,
      elapsedMs: elapsed(),
    };
  }

  try {
    const body = await response.text();
    return { kind: 'fetched', url: finalUrl, status: response.status, contentType, body, elapsedMs: elapsed() };
  } catch (error) {
    const crawlerError = ensureCrawlerError(error, { kind: 'fetch', severity: 'recoverable' });
    return {
      kind: 'failed',
      url: finalUrl,
      status: response.status,
      failure: { reason: 'connection', message: `Body read failed: ${crawlerError.message}` },
      elapsedMs: elapsed(),
    };
  }
}

async function discardBody(response: Response): Promise<void> {
  // Drained so the socket returns to the pool.
  await response.arrayBuffer().catch(() => undefined);
}

async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
