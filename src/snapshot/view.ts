import type { Event } from '../source/adapter.js';
import { addDays, type CalendarDate } from '../shared/calendarDate.js';
import type { Snapshot } from './schema.js';

export type DayLabel = 'today' | 'tomorrow' | null;

export interface AgendaDay {
  date: CalendarDate;
  label: DayLabel;
  events: Event[];
}

export interface Agenda {
  generatedAt: string;
  /** Days matching the filters, before paging. */
  totalDays: number;
  offset: number;
  hasMore: boolean;
  days: AgendaDay[];
}

export interface AgendaOptions {
  today: CalendarDate;
  /** Inclusive bounds. */
  from?: CalendarDate;
  to?: CalendarDate;
  category?: string;
  offset?: number;
  limit?: number;
}

export function dayLabel(date: CalendarDate, today: CalendarDate): DayLabel {
  if (date === today) return 'today';
  if (date === addDays(today, 1)) return 'tomorrow';
  return null;
}

/**
 * Read-side view of a snapshot: day groups filtered by date range and
 * category, labelled today/tomorrow, paged by whole days.
 */
export function buildAgenda(snapshot: Snapshot, options: AgendaOptions): Agenda {
  const category = options.category?.trim().toLowerCase();
  const matching: AgendaDay[] = [];

  for (const [date, events] of snapshot.events) {
    if (options.from && date < options.from) continue;
    if (options.to && date > options.to) continue;

    const dayEvents = category
      ? events.filter((e) => e.categories.some((c) => c.toLowerCase() === category))
      : events;
    if (dayEvents.length === 0) continue;

    matching.push({ date, label: dayLabel(date, options.today), events: dayEvents });
  }

  const offset = Math.max(0, options.offset ?? 0);
  const end = options.limit !== undefined ? offset + Math.max(0, options.limit) : matching.length;

  return {
    generatedAt: snapshot.generatedAt,
    totalDays: matching.length,
    offset,
    hasMore: end < matching.length,
    days: matching.slice(offset, end),
  };
}
