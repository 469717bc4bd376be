import { describe, it, expect } from 'vitest';
import { buildAgenda, dayLabel } from '../view.js';
import type { Snapshot } from '../schema.js';
import type { Event } from '../../source/adapter.js';

function event(date: string, title: string, categories: string[]): Event {
  return {
    title,
    link: `https://a.example.com/${title.toLowerCase()}`,
    place: 'Blue Room',
    date,
    categories,
    source: 'https://a.example.com/events',
  };
}

const SNAPSHOT: Snapshot = {
  generatedAt: '2024-06-04T08:00:00.000Z',
  events: new Map([
    ['2024-06-04', [event('2024-06-04', 'Quiz', ['pub'])]],
    ['2024-06-05', [event('2024-06-05', 'Jazz', ['music', 'Jazz']), event('2024-06-05', 'Poetry', ['words'])]],
    ['2024-06-09', [event('2024-06-09', 'Choir', ['music'])]],
  ]),
};

describe('dayLabel', () => {
  it('labels today and tomorrow only', () => {
    expect(dayLabel('2024-06-04', '2024-06-04')).toBe('today');
    expect(dayLabel('2024-06-05', '2024-06-04')).toBe('tomorrow');
    expect(dayLabel('2024-06-06', '2024-06-04')).toBeNull();
    expect(dayLabel('2024-06-03', '2024-06-04')).toBeNull();
  });

  it('crosses month ends', () => {
    expect(dayLabel('2024-07-01', '2024-06-30')).toBe('tomorrow');
  });
});

describe('buildAgenda', () => {
  it('returns every day with labels', () => {
    const agenda = buildAgenda(SNAPSHOT, { today: '2024-06-04' });
    expect(agenda.days.map((d) => [d.date, d.label, d.events.length])).toEqual([
      ['2024-06-04', 'today', 1],
      ['2024-06-05', 'tomorrow', 2],
      ['2024-06-09', null, 1],
    ]);
    expect(agenda.totalDays).toBe(3);
    expect(agenda.hasMore).toBe(false);
    expect(agenda.generatedAt).toBe('2024-06-04T08:00:00.000Z');
  });

  it('filters by inclusive date range', () => {
    const agenda = buildAgenda(SNAPSHOT, { today: '2024-06-04', from: '2024-06-05', to: '2024-06-09' });
    expect(agenda.days.map((d) => d.date)).toEqual(['2024-06-05', '2024-06-09']);
  });

  it('filters by category ignoring case and drops emptied days', () => {
    const agenda = buildAgenda(SNAPSHOT, { today: '2024-06-04', category: 'MUSIC' });
    expect(agenda.days.map((d) => [d.date, d.events.map((e) => e.title)])).toEqual([
      ['2024-06-05', ['Jazz']],
      ['2024-06-09', ['Choir']],
    ]);
  });

  it('pages by whole days', () => {
    const first = buildAgenda(SNAPSHOT, { today: '2024-06-04', limit: 2 });
    expect(first.days.map((d) => d.date)).toEqual(['2024-06-04', '2024-06-05']);
    expect(first.hasMore).toBe(true);

    const second = buildAgenda(SNAPSHOT, { today: '2024-06-04', offset: 2, limit: 2 });
    expect(second.days.map((d) => d.date)).toEqual(['2024-06-09']);
    expect(second.offset).toBe(2);
    expect(second.hasMore).toBe(false);
  });
});
