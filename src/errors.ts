export type ErrorKind =
  | 'fetch'
  | 'parse'
  | 'normalize'
  | 'sitemap'
  | 'config'
  | 'output'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

interface FactoryOptions {
  severity?: ErrorSeverity;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  return new CrawlerError({
    message: error instanceof Error ? error.message : String(error),
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

function factory(kind: ErrorKind, defaultSeverity: ErrorSeverity) {
  return (
    message: string,
    details: Record<string, unknown> = {},
    options: FactoryOptions = {},
  ): CrawlerError =>
    new CrawlerError({
      message,
      kind,
      severity: options.severity ?? defaultSeverity,
      details,
      cause: options.cause,
    });
}

export const createFetchError = factory('fetch', 'recoverable');
export const createParseError = factory('parse', 'recoverable');
export const createSitemapError = factory('sitemap', 'recoverable');
export const createOutputError = factory('output', 'recoverable');

// Configuration problems always abort the run.
export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({ message, kind: 'config', severity: 'fatal', details, cause: options.cause });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
