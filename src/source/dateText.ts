import {
  addDays,
  makeCalendarDate,
  parseCalendarDate,
  type CalendarDate,
} from '../shared/calendarDate.js';

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[t\s])/;
const NUMERIC_RE = /^(\d{1,2})[/.-](\d{1,2})(?:[/.-](\d{4}|\d{2}))?(?!\d)/;
const MONTH_DAY_RE = /^([a-z]{3,})\.?\s+(\d{1,2})(?:st|nd|rd|th)?(?:,?\s+(\d{4}))?(?!\d)/;
const DAY_MONTH_RE = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]{3,})\.?(?:,?\s+(\d{4}))?(?!\d)/;
const WEEKDAY_PREFIX_RE = /^(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/;
const RANGE_SEPARATOR_RE = /\s+[–—-]\s+/;
const TRAILING_YEAR_RE = /(?:,?\s+|[/.-])(\d{4})$/;
const NUMERIC_DAY_MONTH_RE = /^\d{1,2}[/.-]\d{1,2}$/;

function monthFromName(name: string): number | null {
  return MONTHS[name.slice(0, 3)] ?? null;
}

/**
 * Expand a two-digit year into the century of the run date.
 */
function expandYear(raw: string, runYear: number): number {
  const value = Number(raw);
  if (raw.length === 4) return value;
  return Math.floor(runYear / 100) * 100 + value;
}

/**
 * Nearest date on or after `runDate` falling on month/day. A month/day equal
 * to the run date's resolves to the run date itself; 29 February resolves to
 * the next leap year that has not passed.
 */
export function nearestFutureDate(month: number, day: number, runDate: CalendarDate): CalendarDate | null {
  const run = parseCalendarDate(runDate);
  if (!run) return null;
  // a leap day recurs within 8 years
  for (let year = run.year; year <= run.year + 8; year++) {
    const candidate = makeCalendarDate(year, month, day);
    if (candidate !== null && candidate >= runDate) return candidate;
  }
  return null;
}

/**
 * First date of a range, borrowing the year from the end of the range when
 * only the last date carries one ("Mar 15 - Mar 17, 2025").
 */
function firstOfRange(value: string): string {
  const [first = value, ...rest] = value.split(RANGE_SEPARATOR_RE);
  const last = rest[rest.length - 1];
  if (last === undefined || /\d{4}/.test(first)) return first;

  const year = TRAILING_YEAR_RE.exec(last)?.[1];
  if (year === undefined) return first;
  return NUMERIC_DAY_MONTH_RE.test(first) ? `${first}/${year}` : `${first} ${year}`;
}

function resolve(
  day: number,
  month: number,
  year: number | null,
  runDate: CalendarDate,
): CalendarDate | null {
  if (year === null) return nearestFutureDate(month, day, runDate);
  return makeCalendarDate(year, month, day);
}

/**
 * Turn upstream date text into a CalendarDate.
 *
 * Accepts relative words (today, tomorrow, happening now), ISO dates,
 * day/month/year numerics (also with . or -), and English month names in
 * either order, optionally preceded by a weekday and followed by a time
 * ("Fri, Mar 15 at 8:00 PM CET"). For ranges the first date wins, taking
 * the year written after the last date when it has none of its own. Returns
 * null when nothing parses to a real calendar day.
 */
export function parseEventDate(text: string, runDate: CalendarDate): CalendarDate | null {
  const run = parseCalendarDate(runDate);
  if (!run) return null;

  let value = text.replace(/\s+/g, ' ').trim().toLowerCase();
  if (!value) return null;

  if (value.includes('happening now') || /\btoday\b/.test(value)) return runDate;
  if (/\btomorrow\b/.test(value)) return addDays(runDate, 1);

  value = value.replace(WEEKDAY_PREFIX_RE, '');
  const iso = ISO_RE.exec(value);
  if (iso) return makeCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  value = firstOfRange(value);

  const numeric = NUMERIC_RE.exec(value);
  if (numeric) {
    const year = numeric[3] !== undefined ? expandYear(numeric[3], run.year) : null;
    return resolve(Number(numeric[1]), Number(numeric[2]), year, runDate);
  }

  const monthDay = MONTH_DAY_RE.exec(value);
  if (monthDay) {
    const month = monthFromName(monthDay[1] ?? '');
    if (month !== null) {
      const year = monthDay[3] !== undefined ? Number(monthDay[3]) : null;
      return resolve(Number(monthDay[2]), month, year, runDate);
    }
  }

  const dayMonth = DAY_MONTH_RE.exec(value);
  if (dayMonth) {
    const month = monthFromName(dayMonth[2] ?? '');
    if (month !== null) {
      const year = dayMonth[3] !== undefined ? Number(dayMonth[3]) : null;
      return resolve(Number(dayMonth[1]), month, year, runDate);
    }
  }

  return null;
}
