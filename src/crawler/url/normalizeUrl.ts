const DEFAULT_PORT_MAP: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

/**
 * Canonical form used for frontier keys and link targets. Returns null for
 * anything that is not an absolute http(s) URL once resolved against `base`.
 */
export function normalizeUrl(raw: string, base: URL | string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim(), base);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  url.hostname = url.hostname.toLowerCase();
  url.hash = '';

  removeDefaultPort(url);
  normalizePath(url);

  return url.toString();
}

function removeDefaultPort(url: URL): void {
  const defaultPort = DEFAULT_PORT_MAP[url.protocol];
  if (defaultPort && url.port === defaultPort) {
    url.port = '';
  }
}

function normalizePath(url: URL): void {
  if (url.pathname === '/') {
    return;
  }

  const trimmed = url.pathname.replace(/\/+$/, '');
  url.pathname = trimmed.length > 0 ? trimmed : '/';
}
