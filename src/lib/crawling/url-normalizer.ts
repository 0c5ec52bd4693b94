/**
 * URL Normalization Utilities
 * Functions for resolving, validating and comparing URLs
 */

/**
 * How two hosts are compared:
 * - `exact`: string equality of the literal authority (crawler enqueue filter)
 * - `site`: case-insensitive equality, subdomains, or the `www.` variant (link audits)
 */
export type HostMatchPolicy = 'exact' | 'site';

export const INVALID_URL_MESSAGE = 'Invalid URL provided. URL must include http:// or https://';

/**
 * Resolve an href against the page it was found on.
 * Absolute http(s) URLs are returned unchanged, so the function is idempotent.
 */
export function normalizeUrl(href: string, baseUrl: string): string {
  if (!href) {
    return '';
  }

  if (href.startsWith('http://') || href.startsWith('https://')) {
    return href;
  }

  try {
    if (href.startsWith('//')) {
      return `${new URL(baseUrl).protocol}${href}`;
    }
    return new URL(href, baseUrl).href;
  } catch {
    return '';
  }
}

/**
 * http/https scheme and a non-empty host
 */
export function isValidHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.host !== '';
  } catch {
    return false;
  }
}

/**
 * host[:port] of a URL, or '' when it cannot be parsed
 */
export function getNetloc(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

const AUTHORITY_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/([^/?#]*)/i;

/**
 * Authority exactly as written in the URL: no case folding, default ports kept
 */
export function getAuthority(url: string): string {
  const match = AUTHORITY_PATTERN.exec(url);
  return match ? match[1] : '';
}

export function hostMatches(host: string, baseHost: string, policy: HostMatchPolicy): boolean {
  if (!host) {
    return false;
  }

  if (policy === 'exact') {
    return host === baseHost;
  }

  const candidate = host.toLowerCase();
  const base = baseHost.toLowerCase();
  return candidate === base || candidate.endsWith(`.${base}`) || candidate === `www.${base}`;
}

/**
 * Crawler enqueue filter: non-empty, unvisited, budget left, same netloc as the start URL
 */
export function shouldCrawlUrl(
  url: string,
  startUrl: string,
  visited: ReadonlySet<string>,
  maxPages: number
): boolean {
  if (!url || visited.has(url)) {
    return false;
  }

  if (visited.size >= maxPages) {
    return false;
  }

  return hostMatches(getAuthority(url), getAuthority(startUrl), 'exact');
}
