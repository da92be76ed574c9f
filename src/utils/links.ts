/**
 * Link utilities
 */

/**
 * Normalizes a link into the key used for deduplication.
 * http and https compare equal, host case is ignored, fragments are dropped
 * and a trailing slash on a non-root path is removed. The query string is
 * kept because the portal uses it to address distinct documents.
 * Links that do not parse as URLs are compared as trimmed strings.
 */
export function normalizeLink(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) return '';

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed;
  }

  if (url.protocol === 'http:') {
    url.protocol = 'https:';
  }
  url.hash = '';
  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }
  return url.toString();
}

/**
 * Resolves a possibly relative href against a base URL.
 * @returns the absolute URL, or null when the href cannot be resolved
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  try {
    return new URL(href.trim(), baseUrl).toString();
  } catch {
    return null;
  }
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
