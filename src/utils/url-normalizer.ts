/**
 * URL normalization for classification requests
 */

import type { UrlScheme } from './config-schemas.js';

const SCHEME_PATTERN = /^https?:\/\//i;

export const DEFAULT_URL_SCHEME: UrlScheme = 'http';

/**
 * Prefix `scheme://` unless the input already carries http:// or https://.
 * Applying it twice gives the same result as applying it once.
 */
export function normalizeUrl(rawUrl: string, scheme: UrlScheme = DEFAULT_URL_SCHEME): string {
  const url = rawUrl.trim();
  if (SCHEME_PATTERN.test(url)) {
    return url;
  }
  if (url.startsWith('//')) {
    return `${scheme}:${url}`;
  }
  return `${scheme}://${url}`;
}

/**
 * True when the normalized form parses as an http(s) URL with a host
 */
export function isClassifiableUrl(rawUrl: string, scheme: UrlScheme = DEFAULT_URL_SCHEME): boolean {
  if (!rawUrl.trim()) {
    return false;
  }
  try {
    const parsed = new URL(normalizeUrl(rawUrl, scheme));
    return ['http:', 'https:'].includes(parsed.protocol) && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}
