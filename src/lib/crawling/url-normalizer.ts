/**
 * URL Normalization Utilities
 * Canonical comparison keys for frontier deduplication
 */

import { CrawlResult } from './crawling.types';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Remove any number of trailing slashes
 */
function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Parse an absolute http(s) URL
 */
export function parseHttpUrl(url: string): CrawlResult<URL> {
  try {
    const urlObj = new URL(url.trim());
    if (!SUPPORTED_PROTOCOLS.has(urlObj.protocol)) {
      return { ok: false, error: new Error(`Unsupported protocol "${urlObj.protocol}" in ${url}`) };
    }
    if (!urlObj.hostname) {
      return { ok: false, error: new Error(`Missing host in ${url}`) };
    }
    return { ok: true, value: urlObj };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error : new Error(`Invalid URL ${url}`),
    };
  }
}

/**
 * Normalize a URL, reporting whether it could be parsed.
 * Output is `scheme://host/path[?query]` with no fragment and no trailing slash.
 */
export function tryNormalizeUrl(url: string): CrawlResult<string> {
  const parsed = parseHttpUrl(url);
  if (!parsed.ok) {
    return parsed;
  }

  const urlObj = parsed.value;
  // `host` keeps a non-default port; the parser already lower-cases it
  let normalized = `${urlObj.protocol}//${urlObj.host}${stripTrailingSlashes(urlObj.pathname)}`;
  if (urlObj.search.length > 1) {
    normalized += urlObj.search;
  }

  return { ok: true, value: normalized };
}

/**
 * Normalize a URL to its canonical comparison key. Never throws: input that
 * cannot be parsed falls back to plain fragment removal.
 */
export function normalizeUrl(url: string): string {
  const result = tryNormalizeUrl(url);
  if (result.ok) {
    return result.value;
  }

  console.warn(`[UrlNormalizer] Invalid URL ${url}: ${result.error.message}`);
  return stripTrailingSlashes(url.split('#')[0].trim());
}

/**
 * Resolve a relative URL against the page it was found on
 */
export function resolveUrl(url: string, baseUrl: string): string {
  try {
    if (url.startsWith('http://') || url.startsWith('https://')) {
      return url;
    }
    return new URL(url, baseUrl).href;
  } catch {
    return url;
  }
}

/**
 * Extract the lower-cased host (with non-default port) of a URL
 */
export function extractHost(url: string): string | null {
  const parsed = parseHttpUrl(url);
  return parsed.ok ? parsed.value.host : null;
}

/**
 * First non-empty path segment of a URL, or null when the path is the root
 */
export function firstPathSegment(urlObj: URL): string | null {
  const segment = urlObj.pathname.split('/')[1];
  return segment ? segment : null;
}
