export interface SiteScopeOptions {
  /** Treat `www.example.com` and `example.com` as the same site. */
  wwwEquivalence: boolean;
}

export function siteHost(hostname: string, options: SiteScopeOptions): string {
  const lowered = hostname.toLowerCase();
  return options.wwwEquivalence ? stripWww(lowered) : lowered;
}

export function stripWww(hostname: string): string {
  return hostname.startsWith('www.') ? hostname.slice(4) : hostname;
}

export function isInternal(url: string | URL, rootHost: string, options: SiteScopeOptions): boolean {
  try {
    const parsed = typeof url === 'string' ? new URL(url) : url;
    return siteHost(parsed.hostname, options) === siteHost(rootHost, options);
  } catch {
    return false;
  }
}
