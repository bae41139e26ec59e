import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createFetchError, createSitemapError } from '../src/errors.js';
import { configureLogger, setLoggerInstance, type LoggerLike } from '../src/logger.js';
import { buildLogMessage, reportCrawlerError } from '../src/util/errorHandler.js';

function createFakeLogger() {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: (): LoggerLike => logger,
  };
  return logger;
}

let logger: ReturnType<typeof createFakeLogger>;

beforeEach(() => {
  logger = createFakeLogger();
  setLoggerInstance(logger);
});

afterEach(() => {
  configureLogger();
});

describe('reportCrawlerError', () => {
  it('logs recoverable errors as warnings without throwing', () => {
    const error = createFetchError('retry later', { url: 'https://example.com' });

    expect(() => {
      reportCrawlerError(error, { stage: 'fetch', attempt: 1 });
    }).not.toThrow();

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      { kind: 'fetch', url: 'https://example.com', stage: 'fetch', attempt: 1 },
      '[fetch/recoverable] retry later (attempt=1 stage="fetch" url="https://example.com")',
    );
  });

  it('throws on fatal errors by default', () => {
    const fatalError = createFetchError('boom', {}, { severity: 'fatal' });

    expect(() => reportCrawlerError(fatalError, { stage: 'crawl' })).toThrowError(fatalError);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('can suppress throwing on fatal errors when requested', () => {
    const fatalError = createFetchError('boom', {}, { severity: 'fatal' });

    expect(() => reportCrawlerError(fatalError, { stage: 'crawl' }, { throwOnFatal: false })).not.toThrow();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('wraps unknown errors as fatal internal errors', () => {
    const result = reportCrawlerError('oops', { stage: 'cli' }, { throwOnFatal: false });

    expect(result.kind).toBe('internal');
    expect(result.severity).toBe('fatal');
    expect(result.message).toBe('oops');
  });

  it('uses the default kind and severity for foreign errors', () => {
    const result = reportCrawlerError(new Error('handler broke'), { stage: 'onPage' }, {
      defaultKind: 'output',
      defaultSeverity: 'recoverable',
    });

    expect(result.kind).toBe('output');
    expect(result.severity).toBe('recoverable');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('buildLogMessage', () => {
  it('omits the context block when there are no details', () => {
    expect(buildLogMessage(createSitemapError('no sitemap'), {})).toBe('[sitemap/recoverable] no sitemap');
  });

  it('skips undefined values', () => {
    const message = buildLogMessage(createSitemapError('no sitemap'), { url: undefined, reason: 'HTTP 404' });

    expect(message).toBe('[sitemap/recoverable] no sitemap (reason="HTTP 404")');
  });
});
