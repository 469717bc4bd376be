import { z } from 'zod';
import type { CalendarDate } from '../shared/calendarDate.js';
import type { FetchError } from '../shared/errors.js';

/**
 * One upstream page configured for scraping.
 */
export interface Source {
  url: string;
  /** Trimmed, non-empty, de-duplicated labels in first-seen order. */
  categories: readonly string[];
  /** Registration order, 0-based. */
  index: number;
}

const NamedSchema = z.object({ name: z.string().optional().catch(undefined) });

/**
 * schema.org Event as found in application/ld+json blocks. Only the fields
 * the extractor reads are kept; a field of the wrong shape reads as absent.
 */
export const JsonLdEventSchema = z.object({
  '@type': z.union([z.string(), z.array(z.string())]),
  name: z.string().optional().catch(undefined),
  startDate: z.string().optional().catch(undefined),
  url: z.string().optional().catch(undefined),
  location: z.union([z.string(), NamedSchema]).optional().catch(undefined),
  performer: z.union([NamedSchema, z.array(NamedSchema)]).optional().catch(undefined),
  performers: z.array(NamedSchema).optional().catch(undefined),
});

export type JsonLdEvent = z.infer<typeof JsonLdEventSchema>;

/**
 * Source-specific payload before parsing. Owned by the fetcher, discarded
 * once extracted.
 */
export type RawEvent =
  | { kind: 'markup'; source: Source; pageUrl: string; html: string }
  | { kind: 'structured'; source: Source; pageUrl: string; data: JsonLdEvent };

export interface Event {
  title: string;
  link: string;
  place: string;
  date: CalendarDate;
  categories: readonly string[];
  /** URL of the Source the event was scraped from. */
  source: string;
}

export type SourceFetchResult =
  | { ok: true; source: Source; rawEvents: RawEvent[]; rendered: boolean }
  | { ok: false; source: Source; error: FetchError };
