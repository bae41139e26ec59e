import type { AuthorityRules, LinkRecord } from '../../types.js';
import { isAuthorityDomain } from '../classify/classifyDomain.js';
import { isCrawlable } from '../url/crawlable.js';
import { normalizeUrl } from '../url/normalizeUrl.js';
import { isInternal, stripWww, type SiteScopeOptions } from '../url/siteScope.js';
import { extractAnchors } from './extractAnchors.js';

export const MAX_ANCHOR_TEXT_LENGTH = 200;

export interface ParseContext extends SiteScopeOptions {
  rootHost: string;
  authorityRules: AuthorityRules;
}

export interface ParsedPage {
  title?: string;
  internalLinks: string[];
  externalLinks: LinkRecord[];
}

/**
 * Splits a page's anchors into internal links (frontier candidates) and
 * classified external link records, both in document order. `pageUrl` is
 * the base for relative hrefs and the `sourcePage` of every record.
 */
export function parsePage(pageUrl: string, html: string, context: ParseContext): ParsedPage {
  const { title, anchors } = extractAnchors(html);
  const internalLinks = new Set<string>();
  const externalLinks: LinkRecord[] = [];
  const seenExternal = new Set<string>();
  const base = new URL(pageUrl);

  for (const anchor of anchors) {
    const normalized = normalizeUrl(anchor.href, base);
    if (!normalized) {
      continue;
    }

    const target = new URL(normalized);

    if (isInternal(target, context.rootHost, context)) {
      if (isCrawlable(target)) {
        internalLinks.add(normalized);
      }
      continue;
    }

    if (seenExternal.has(normalized)) {
      continue;
    }
    seenExternal.add(normalized);

    const targetDomain = stripWww(target.hostname);
    externalLinks.push(
      Object.freeze({
        sourcePage: pageUrl,
        targetUrl: normalized,
        anchorText: anchor.text.slice(0, MAX_ANCHOR_TEXT_LENGTH),
        rel: Object.freeze([...anchor.rel]),
        targetDomain,
        isAuthority: isAuthorityDomain(targetDomain, context.authorityRules),
      }),
    );
  }

  return { title, internalLinks: [...internalLinks], externalLinks };
}
