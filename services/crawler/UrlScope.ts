/**
 * UrlScope
 *
 * URL normalization, link resolution and the same-site scope test used by
 * the crawler.
 */

import { URL } from 'url';

/**
 * Parse an absolute URL and drop its fragment.
 * @returns the normalized href, or null if the URL does not parse
 */
export function normalizeUrl(url: string): string | null {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    return parsed.href;
  } catch {
    return null;
  }
}

/**
 * Resolve an href against a base URL and normalize the result.
 * @returns the absolute URL, or null if it cannot be resolved
 */
export function resolveUrl(base: string, href: string): string | null {
  try {
    const resolved = new URL(href, base);
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Network location (host[:port]) of a URL, empty if it does not parse or
 * has none (mailto:, javascript:, ...)
 */
export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/**
 * Whether a resolved link stays inside the crawl.
 *
 * With a scope base the test is a literal string prefix, so a base of
 * `https://example.com` also admits `https://example.com.evil.com`.
 * Without one the link host must equal the host of the page it was found on.
 */
export function isInScope(link: string, currentUrl: string, scopeBase?: string): boolean {
  if (scopeBase !== undefined) {
    return link.startsWith(scopeBase);
  }
  const host = hostOf(link);
  return host !== '' && host === hostOf(currentUrl);
}
