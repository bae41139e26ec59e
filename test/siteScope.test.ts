import { describe, expect, it } from 'vitest';

import { isCrawlable } from '../src/crawler/url/crawlable.js';
import { isInternal, siteHost } from '../src/crawler/url/siteScope.js';

describe('isInternal', () => {
  const on = { wwwEquivalence: true };
  const off = { wwwEquivalence: false };

  it('matches identical hosts ignoring case', () => {
    expect(isInternal('https://Example.com/page', 'example.com', on)).toBe(true);
    expect(isInternal('https://Example.com/page', 'example.com', off)).toBe(true);
  });

  it('treats www and bare hosts as one site when equivalence is on', () => {
    expect(isInternal('https://www.example.com/a', 'example.com', on)).toBe(true);
    expect(isInternal('https://example.com/a', 'www.example.com', on)).toBe(true);
  });

  it('keeps www and bare hosts apart when equivalence is off', () => {
    expect(isInternal('https://www.example.com/a', 'example.com', off)).toBe(false);
  });

  it('treats other subdomains as external', () => {
    expect(isInternal('https://blog.example.com/', 'example.com', on)).toBe(false);
  });

  it('returns false when URL parsing fails', () => {
    expect(isInternal('not-a-url', 'example.com', on)).toBe(false);
  });

  it('derives the comparable site host', () => {
    expect(siteHost('WWW.Example.com', on)).toBe('example.com');
    expect(siteHost('WWW.Example.com', off)).toBe('www.example.com');
  });
});

describe('isCrawlable', () => {
  it('accepts document-like paths', () => {
    expect(isCrawlable('https://example.com/about')).toBe(true);
    expect(isCrawlable('https://example.com/index.html')).toBe(true);
    expect(isCrawlable('https://example.com/v1.2/page')).toBe(true);
    expect(isCrawlable('https://example.com/')).toBe(true);
  });

  it('rejects static assets regardless of case', () => {
    expect(isCrawlable('https://example.com/files/Report.PDF')).toBe(false);
    expect(isCrawlable('https://example.com/archive.tar.gz')).toBe(false);
    expect(isCrawlable('https://example.com/sitemap.xml')).toBe(false);
  });
});
