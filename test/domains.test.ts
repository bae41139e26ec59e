import { describe, expect, it } from 'vitest';

import { summarizeDomains } from '../src/crawler/reporting/domains.js';
import type { LinkRecord, PageRecord } from '../src/types.js';

const linkTo = (sourcePage: string, targetDomain: string, isAuthority = false): LinkRecord => ({
  sourcePage,
  targetUrl: `https://${targetDomain}/`,
  anchorText: '',
  rel: [],
  targetDomain,
  isAuthority,
});

const page = (url: string, links: LinkRecord[]): PageRecord => ({
  url,
  depth: 0,
  status: 'fetched',
  externalLinks: links,
});

describe('summarizeDomains', () => {
  it('counts links and referring pages per domain', () => {
    const pages = [
      page('https://example.com/b', [linkTo('https://example.com/b', 'zeta.org'), linkTo('https://example.com/b', 'cdc.gov', true)]),
      page('https://example.com/a', [linkTo('https://example.com/a', 'zeta.org')]),
      page('https://example.com/c', []),
    ];

    expect(summarizeDomains(pages)).toEqual([
      {
        domain: 'zeta.org',
        linkCount: 2,
        isAuthority: false,
        referringPages: ['https://example.com/a', 'https://example.com/b'],
      },
      { domain: 'cdc.gov', linkCount: 1, isAuthority: true, referringPages: ['https://example.com/b'] },
    ]);
  });

  it('breaks ties by domain name', () => {
    const pages = [page('https://example.com/', [linkTo('https://example.com/', 'b.org'), linkTo('https://example.com/', 'a.org')])];

    expect(summarizeDomains(pages).map((entry) => entry.domain)).toEqual(['a.org', 'b.org']);
  });

  it('reclassifies domains when rules are given', () => {
    const pages = [page('https://example.com/', [linkTo('https://example.com/', 'nature.com')])];

    const [entry] = summarizeDomains(pages, { tldSuffixes: [], domains: ['nature.com'], keywords: [] });

    expect(entry?.isAuthority).toBe(true);
  });
});
