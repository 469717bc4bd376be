import type { Event } from '../source/adapter.js';
import { eventDedupKey } from '../source/dedup.js';
import type { CalendarDate } from '../shared/calendarDate.js';

/**
 * Events grouped by day. Keys are in ascending date order; every event under
 * a key carries that date.
 */
export type EventsByDate = Map<CalendarDate, Event[]>;

export interface AggregateOptions {
  runDate: CalendarDate;
  /** Keep dates before `runDate`. */
  includePast?: boolean;
  /**
   * Source URLs in registration order, used to order events within a day.
   * Without it, sources rank by first appearance in the input.
   */
  sourceOrder?: readonly string[];
}

export interface AggregateStats {
  input: number;
  duplicates: number;
  past: number;
  output: number;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function aggregateWithStats(
  events: readonly Event[],
  options: AggregateOptions,
): { events: EventsByDate; stats: AggregateStats } {
  const stats: AggregateStats = { input: events.length, duplicates: 0, past: 0, output: 0 };

  const rank = new Map<string, number>();
  for (const url of options.sourceOrder ?? []) {
    if (!rank.has(url)) rank.set(url, rank.size);
  }

  const seen = new Set<string>();
  const groups = new Map<CalendarDate, Event[]>();

  for (const event of events) {
    if (!rank.has(event.source)) rank.set(event.source, rank.size);

    const key = eventDedupKey(event);
    if (seen.has(key)) {
      stats.duplicates++;
      continue;
    }
    seen.add(key);

    if (!options.includePast && event.date < options.runDate) {
      stats.past++;
      continue;
    }

    const group = groups.get(event.date);
    if (group) group.push(event);
    else groups.set(event.date, [event]);
  }

  const sourceRank = (e: Event): number => rank.get(e.source) ?? Number.MAX_SAFE_INTEGER;
  const byDate: EventsByDate = new Map();

  for (const date of [...groups.keys()].sort(compareText)) {
    const group = groups.get(date) ?? [];
    group.sort(
      (a, b) => sourceRank(a) - sourceRank(b) || compareText(a.title, b.title) || compareText(a.link, b.link),
    );
    byDate.set(date, group);
    stats.output += group.length;
  }

  return { events: byDate, stats };
}

/**
 * Merge events from all sources into one mapping: duplicates dropped (first
 * seen wins), grouped by date, dates ascending, each day ordered by source
 * rank, then title, then link. Past dates are dropped unless `includePast`.
 */
export function aggregate(events: readonly Event[], options: AggregateOptions): EventsByDate {
  return aggregateWithStats(events, options).events;
}
