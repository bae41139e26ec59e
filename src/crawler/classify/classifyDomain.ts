import { getDomainWithoutSuffix } from 'tldts';

import type { AuthorityRules, AuthorityRulesOverride, DomainClass } from '../../types.js';

export const DEFAULT_AUTHORITY_RULES: AuthorityRules = {
  tldSuffixes: ['gov', 'edu', 'mil'],
  domains: [
    'who.int',
    'irs.gov',
    'consumerfinance.gov',
    'ftc.gov',
    'sec.gov',
    'federalreserve.gov',
    'treasury.gov',
    'ncua.gov',
    'fdic.gov',
    'cfpb.gov',
    'cdc.gov',
    'nih.gov',
    'fda.gov',
    'wikipedia.org',
    'britannica.com',
    'reuters.com',
    'apnews.com',
  ],
  keywords: [],
};

export function classifyDomain(hostname: string, rules: AuthorityRules = DEFAULT_AUTHORITY_RULES): DomainClass {
  return isAuthorityDomain(hostname, rules) ? 'authority' : 'non-authority';
}

export function isAuthorityDomain(hostname: string, rules: AuthorityRules = DEFAULT_AUTHORITY_RULES): boolean {
  const host = hostname.trim().toLowerCase().replace(/\.$/, '');
  if (!host) {
    return false;
  }

  if (rules.tldSuffixes.some((suffix) => matchesOnLabelBoundary(host, cleanRule(suffix)))) {
    return true;
  }

  if (rules.domains.some((domain) => matchesOnLabelBoundary(host, cleanRule(domain)))) {
    return true;
  }

  const registrable = registrableLabel(host);
  return rules.keywords.some((keyword) => {
    const needle = keyword.trim().toLowerCase();
    return needle.length > 0 && registrable.includes(needle);
  });
}

/**
 * Appends override lists to `base`, or swaps them in wholesale when
 * `override.replace` is set. Entries are lowercased and de-duplicated.
 */
export function mergeAuthorityRules(
  base: AuthorityRules,
  override: AuthorityRulesOverride = {},
): AuthorityRules {
  const pick = (key: keyof AuthorityRules): string[] => {
    const extra = override[key] ?? [];
    const combined = override.replace && override[key] ? extra : [...base[key], ...extra];
    return [...new Set(combined.map(cleanRule).filter((entry) => entry.length > 0))];
  };

  return {
    tldSuffixes: pick('tldSuffixes'),
    domains: pick('domains'),
    keywords: pick('keywords'),
  };
}

// `gov` matches `irs.gov` and `gov`, never `notgov.com` or `agov`.
function matchesOnLabelBoundary(host: string, rule: string): boolean {
  if (!rule) {
    return false;
  }
  return host === rule || host.endsWith(`.${rule}`);
}

function cleanRule(rule: string): string {
  return rule.trim().toLowerCase().replace(/^\.+/, '');
}

// `www.bbc.co.uk` -> `bbc`. Hosts without a known public suffix stay whole.
function registrableLabel(host: string): string {
  return getDomainWithoutSuffix(host) || host;
}
