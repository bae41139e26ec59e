import type { AuthorityRules, DomainStats, PageRecord } from '../../types.js';
import { isAuthorityDomain } from '../classify/classifyDomain.js';

/**
 * Aggregates external links per target domain. With `rules`, the authority
 * flag is recomputed; otherwise it is taken from the link records.
 * Sorted by link count (descending), then domain name.
 */
export function summarizeDomains(
  pages: Iterable<PageRecord>,
  rules?: AuthorityRules,
): DomainStats[] {
  const byDomain = new Map<string, { count: number; authority: boolean; pages: Set<string> }>();

  for (const page of pages) {
    for (const link of page.externalLinks) {
      const entry = byDomain.get(link.targetDomain) ?? {
        count: 0,
        authority: rules ? isAuthorityDomain(link.targetDomain, rules) : link.isAuthority,
        pages: new Set<string>(),
      };
      entry.count += 1;
      entry.pages.add(link.sourcePage);
      byDomain.set(link.targetDomain, entry);
    }
  }

  return [...byDomain.entries()]
    .map(([domain, entry]) => ({
      domain,
      linkCount: entry.count,
      isAuthority: entry.authority,
      referringPages: [...entry.pages].sort(),
    }))
    .sort((a, b) => b.linkCount - a.linkCount || a.domain.localeCompare(b.domain));
}
