import { JSDOM } from 'jsdom';
import type { Event, JsonLdEvent, RawEvent } from './adapter.js';
import { cleanLink } from './dedup.js';
import { parseEventDate } from './dateText.js';
import { resolveSiteProfile, type Config, type SiteProfile } from '../shared/config.js';
import type { CalendarDate } from '../shared/calendarDate.js';
import { parseEventFragment } from '../llm/parse.js';
import type { ChatClient } from '../llm/client.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/utils.js';

export type ExtractSkipReason = 'missing_title' | 'missing_date';

/**
 * A listing either yields an Event or is skipped. Skips are expected noise
 * and never surface as errors.
 */
export type ExtractOutcome =
  | { ok: true; event: Event }
  | { ok: false; reason: ExtractSkipReason };

export interface ExtractContext {
  runDate: CalendarDate;
  extract: Config['extract'];
  /** Set when the LLM fallback is enabled. */
  llm?: ChatClient | null;
}

interface Fields {
  title: string | null;
  link: string | null;
  place: string | null;
  date: CalendarDate | null;
}

function collapse(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

function firstText(root: ParentNode, selector: string): string | null {
  for (const el of Array.from(root.querySelectorAll(selector))) {
    const text = collapse(el.textContent);
    if (text) return text;
  }
  return null;
}

function firstHref(root: ParentNode, selector: string): string | null {
  for (const el of Array.from(root.querySelectorAll(selector))) {
    const href = el.getAttribute('href');
    if (href && href.trim()) return href;
  }
  return null;
}

function dateText(root: ParentNode, selector: string): string | null {
  for (const el of Array.from(root.querySelectorAll(selector))) {
    const attr = el.getAttribute('datetime');
    if (attr && attr.trim()) return attr.trim();
    const text = collapse(el.textContent);
    if (text) return text;
  }
  return null;
}

function markupFields(html: string, pageUrl: string, profile: SiteProfile, runDate: CalendarDate): Fields {
  const fragment = JSDOM.fragment(html);
  const href = firstHref(fragment, profile.link);
  const rawDate = dateText(fragment, profile.date);
  return {
    title: firstText(fragment, profile.title),
    link: href ? cleanLink(href, pageUrl) : null,
    place: firstText(fragment, profile.place),
    date: rawDate ? parseEventDate(rawDate, runDate) : null,
  };
}

function performerName(data: JsonLdEvent): string | null {
  const performers = data.performers ?? data.performer;
  const first = Array.isArray(performers) ? performers[0] : performers;
  const name = collapse(first?.name);
  return name.length > 1 ? name : null;
}

function structuredFields(data: JsonLdEvent, pageUrl: string, runDate: CalendarDate): Fields {
  const name = typeof data.name === 'string' ? collapse(data.name) : '';
  const location = data.location;
  const place = typeof location === 'string' ? collapse(location) : collapse(location?.name);
  return {
    title: name.length > 1 ? name : performerName(data),
    link: typeof data.url === 'string' ? cleanLink(data.url, pageUrl) : null,
    place: place || null,
    date: typeof data.startDate === 'string' ? parseEventDate(data.startDate, runDate) : null,
  };
}

async function withLlmFallback(
  fields: Fields,
  raw: Extract<RawEvent, { kind: 'markup' }>,
  context: ExtractContext,
): Promise<Fields> {
  if (!context.llm || (fields.title && fields.date)) return fields;

  try {
    const parsed = await parseEventFragment(context.llm, raw.html, context.extract.llm_excerpt_chars);
    const title = collapse(parsed.title);
    const place = collapse(parsed.place);
    return {
      title: fields.title ?? (title || null),
      date: fields.date ?? (parsed.date_time ? parseEventDate(parsed.date_time, context.runDate) : null),
      place: fields.place ?? (place || null),
      link: fields.link ?? (parsed.url ? cleanLink(parsed.url, raw.pageUrl) : null),
    };
  } catch (err) {
    logger.debug({ source: raw.source.url, error: errorMessage(err) }, 'LLM extraction failed');
    return fields;
  }
}

/**
 * Turn one raw listing into an Event. Listings without a title or without a
 * parseable date are skipped; a missing link falls back to the page URL and
 * a missing place to the configured default.
 */
export async function extractEvent(raw: RawEvent, context: ExtractContext): Promise<ExtractOutcome> {
  let fields: Fields;
  if (raw.kind === 'markup') {
    const profile = resolveSiteProfile(context.extract, raw.source.url);
    fields = await withLlmFallback(markupFields(raw.html, raw.pageUrl, profile, context.runDate), raw, context);
  } else {
    fields = structuredFields(raw.data, raw.pageUrl, context.runDate);
  }

  if (!fields.title) return { ok: false, reason: 'missing_title' };
  if (!fields.date) return { ok: false, reason: 'missing_date' };

  return {
    ok: true,
    event: {
      title: fields.title,
      link: fields.link ?? cleanLink(raw.pageUrl, raw.pageUrl) ?? raw.pageUrl,
      place: fields.place ?? context.extract.default_place,
      date: fields.date,
      categories: raw.source.categories,
      source: raw.source.url,
    },
  };
}
