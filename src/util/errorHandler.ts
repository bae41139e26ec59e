import {
  CrawlerError,
  ensureCrawlerError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Logs a crawler error with its merged context and rethrows it when fatal,
 * unless `throwOnFatal` is false.
 */
export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const details: Record<string, unknown> = {
    ...(crawlerError.details ?? {}),
    ...context,
  };

  const logger = getLogger();
  const message = buildLogMessage(crawlerError, details);

  if (crawlerError.severity === 'fatal') {
    logger.error({ kind: crawlerError.kind, ...details }, message);
    if (options.throwOnFatal ?? true) {
      throw crawlerError;
    }
  } else {
    logger.warn({ kind: crawlerError.kind, ...details }, message);
  }

  return crawlerError;
}

export function buildLogMessage(error: CrawlerError, details: Record<string, unknown>): string {
  const parts = [`[${error.kind}/${error.severity}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries.map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(' ');
}
