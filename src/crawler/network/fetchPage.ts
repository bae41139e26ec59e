import { createFetchError, isCrawlerError, type CrawlerError } from '../../errors.js';
import type { FetchFailureReason } from '../../types.js';

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (compatible; ExternalLinkAuditor/1.0; +https://example.com/link-auditor)';

const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN']);

/**
 * Issues a single GET. Network-level problems are rethrown as recoverable
 * `fetch` errors whose details carry `failure` ('timeout' | 'connection').
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    return await fetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': options.userAgent,
        accept: options.accept ?? 'text/html,application/xhtml+xml,*/*;q=0.8',
      },
    });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const timedOut = controller.signal.aborted;
    const code = extractErrorCode(err);
    const failure: Exclude<FetchFailureReason, 'http'> = timedOut ? 'timeout' : 'connection';
    const message = timedOut
      ? `Request timed out after ${options.timeoutMs}ms`
      : describeConnectionError(err, code);

    throw createFetchError(
      message,
      {
        url,
        failure,
        timeoutMs: options.timeoutMs,
        ...(code ? { code } : {}),
      },
      { cause: err },
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

export function failureOf(error: CrawlerError): Exclude<FetchFailureReason, 'http'> {
  return error.details?.failure === 'timeout' ? 'timeout' : 'connection';
}

export function isRetryableFetchError(error: unknown): boolean {
  if (!(error instanceof Error) || error.name === 'AbortError') {
    return false;
  }

  if (isCrawlerError(error) && error.details?.failure === 'timeout') {
    return false;
  }

  const code = extractErrorCode(error);
  return Boolean(code && RETRYABLE_ERROR_CODES.has(code));
}

function describeConnectionError(error: Error, code: string | undefined): string {
  const base = error.message || 'Request failed';
  return code && !base.includes(code) ? `${base} (${code})` : base;
}

function extractErrorCode(error: Error): string | undefined {
  if (isCrawlerError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return error.cause instanceof Error ? extractErrorCode(error.cause) : undefined;
}
