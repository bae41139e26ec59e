const NON_DOCUMENT_EXTENSIONS = new Set([
  'pdf', 'jpg', 'jpeg', 'png', 'gif', 'svg', 'webp', 'ico',
  'css', 'js', 'xml', 'json',
  'zip', 'gz',
  'mp3', 'mp4', 'avi', 'mov',
  'woff', 'woff2', 'ttf', 'eot', 'otf',
]);

// Internal links to static assets never enter the frontier.
export function isCrawlable(url: string | URL): boolean {
  let pathname: string;
  try {
    pathname = (typeof url === 'string' ? new URL(url) : url).pathname.toLowerCase();
  } catch {
    return false;
  }

  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const dot = lastSegment.lastIndexOf('.');
  if (dot < 0) {
    return true;
  }

  return !NON_DOCUMENT_EXTENSIONS.has(lastSegment.slice(dot + 1));
}
