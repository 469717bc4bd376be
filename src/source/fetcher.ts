import { JSDOM } from 'jsdom';
import { JsonLdEventSchema, type JsonLdEvent, type RawEvent, type Source, type SourceFetchResult } from './adapter.js';
import { HttpPageLoader, RenderedPageLoader, throwIfCancelled, type PageLoader } from './pageLoader.js';
import { resolveSiteProfile, type Config, type SiteProfile } from '../shared/config.js';
import { FetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { errorMessage, mapWithConcurrency } from '../shared/utils.js';

export interface PageLoaders {
  http: PageLoader;
  rendered: PageLoader;
}

export interface FetchOptions {
  fetch: Config['fetch'];
  extract: Config['extract'];
  loaders?: PageLoaders;
  signal?: AbortSignal;
}

export function createPageLoaders(fetchConfig: Config['fetch']): PageLoaders {
  const http = new HttpPageLoader(fetchConfig.user_agent);
  return {
    http,
    rendered: new RenderedPageLoader(fetchConfig.user_agent, fetchConfig.render_settle_ms, http),
  };
}

function isEventType(type: string | string[]): boolean {
  const types = Array.isArray(type) ? type : [type];
  return types.some((t) => /Event$/.test(t) || t === 'Festival');
}

function collectJsonLdEvents(value: unknown, out: JsonLdEvent[]): void {
  if (Array.isArray(value)) {
    for (const item of value) collectJsonLdEvents(item, out);
    return;
  }
  if (value === null || typeof value !== 'object') return;

  if ('@graph' in value && Array.isArray(value['@graph'])) {
    collectJsonLdEvents(value['@graph'], out);
  }
  const parsed = JsonLdEventSchema.safeParse(value);
  if (parsed.success && isEventType(parsed.data['@type'])) {
    out.push(parsed.data);
  }
}

/**
 * Find the listings on a page: one markup fragment per element matching the
 * profile's wrapper selector, plus every schema.org Event in JSON-LD blocks.
 */
export function discoverListings(html: string, pageUrl: string, source: Source, profile: SiteProfile): RawEvent[] {
  const dom = new JSDOM(html, { url: pageUrl });
  try {
    const doc = dom.window.document;
    const rawEvents: RawEvent[] = [];

    for (const el of Array.from(doc.querySelectorAll(profile.wrapper))) {
      rawEvents.push({ kind: 'markup', source, pageUrl, html: el.outerHTML });
    }

    for (const script of Array.from(doc.querySelectorAll('script[type="application/ld+json"]'))) {
      let json: unknown;
      try {
        json = JSON.parse(script.textContent ?? '');
      } catch (err) {
        logger.debug({ source: source.url, error: errorMessage(err) }, 'Skipping unparseable JSON-LD block');
        continue;
      }
      const found: JsonLdEvent[] = [];
      collectJsonLdEvents(json, found);
      for (const data of found) {
        rawEvents.push({ kind: 'structured', source, pageUrl, data });
      }
    }

    return rawEvents;
  } finally {
    dom.window.close();
  }
}

/**
 * Fetch one source and split its page into raw listings. Never throws: every
 * failure, including a page with no listings, comes back as `ok: false`.
 */
export async function fetchSource(source: Source, options: FetchOptions): Promise<SourceFetchResult> {
  const loaders = options.loaders ?? createPageLoaders(options.fetch);
  const profile = resolveSiteProfile(options.extract, source.url);
  const timeoutMs = profile.timeout_ms ?? options.fetch.timeout_ms;
  const loadOptions = { timeoutMs, signal: options.signal };

  const attempt = async (loader: PageLoader): Promise<RawEvent[]> => {
    const page = await loader.load(source.url, loadOptions);
    return discoverListings(page.html, page.finalUrl, source, profile);
  };

  try {
    throwIfCancelled(source.url, options.signal);
    let rendered = profile.render === 'always';
    let rawEvents = await attempt(rendered ? loaders.rendered : loaders.http);

    if (rawEvents.length === 0 && profile.render === 'fallback') {
      logger.debug({ source: source.url }, 'No listings in static page, rendering');
      rendered = true;
      rawEvents = await attempt(loaders.rendered);
    }

    if (rawEvents.length === 0) {
      throw new FetchError(`No event listings found: ${source.url}`, {
        url: source.url,
        wrapper: profile.wrapper,
        rendered,
      });
    }

    logger.debug({ source: source.url, count: rawEvents.length, rendered }, 'Source fetched');
    return { ok: true, source, rawEvents, rendered };
  } catch (err) {
    const error =
      err instanceof FetchError
        ? err
        : new FetchError(`Source fetch failed: ${errorMessage(err)}`, { url: source.url });
    logger.warn({ source: source.url, error: error.message }, 'Source fetch failed');
    return { ok: false, source, error };
  }
}

/**
 * Fetch every source through a bounded pool. Results come back in
 * registration order. Once `signal` aborts, sources still waiting for a slot
 * come back as cancelled without being loaded.
 */
export async function fetchAll(sources: readonly Source[], options: FetchOptions): Promise<SourceFetchResult[]> {
  const loaders = options.loaders ?? createPageLoaders(options.fetch);
  return mapWithConcurrency(sources, options.fetch.concurrency, (source) =>
    fetchSource(source, { ...options, loaders }),
  );
}
