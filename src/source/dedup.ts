import type { Event } from './adapter.js';

const TRACKING_PREFIXES = ['utm_', 'mc_', 'mkt_'];
const TRACKING_KEYS = new Set([
  'ref',
  'ref_src',
  'ref_url',
  'source',
  'fbclid',
  'gclid',
  'dclid',
  'msclkid',
  'igshid',
  '__cft__',
  '__tn__',
  'acontext',
  'aref',
]);

function isTrackingParam(key: string): boolean {
  const lower = key.toLowerCase();
  return TRACKING_KEYS.has(lower) || TRACKING_PREFIXES.some((p) => lower.startsWith(p));
}

function dropTrackingParams(url: URL): void {
  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (isTrackingParam(key)) keysToRemove.push(key);
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }
}

/**
 * Resolve a listing link against the page it came from and strip tracking
 * query parameters and the fragment. Returns null for non-http(s) links.
 */
export function cleanLink(href: string, base: string): string | null {
  let url: URL;
  try {
    url = new URL(href.trim(), base);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
  dropTrackingParams(url);
  url.hash = '';
  return url.toString();
}

/**
 * Normalize a URL for dedup comparison:
 * - Strip trailing slashes
 * - Remove www. prefix
 * - Remove tracking params (utm_*, ref, fbclid, ...)
 * - Sort remaining query params
 * - Lowercase scheme + host
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return raw.trim();
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();

  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  dropTrackingParams(url);
  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  if (pathname === '/') {
    pathname = '';
  }

  const search = url.searchParams.toString();
  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

export function normalizeTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Two events with the same key are the same listing.
 */
export function eventDedupKey(event: Pick<Event, 'date' | 'title' | 'link'>): string {
  return `${event.date}|${normalizeTitle(event.title)}|${normalizeUrl(event.link)}`;
}
