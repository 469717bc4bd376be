import { describe, it, expect } from 'vitest';
import { aggregate, aggregateWithStats } from '../aggregate.js';
import type { Event } from '../../source/adapter.js';

const A = 'https://a.example.com/events';
const B = 'https://b.example.com/events';

function event(overrides: Partial<Event> = {}): Event {
  return {
    title: 'Jazz Night',
    link: 'https://a.example.com/e/1',
    place: 'Blue Room',
    date: '2024-06-05',
    categories: ['music'],
    source: A,
    ...overrides,
  };
}

describe('aggregate', () => {
  it('groups by date with dates ascending', () => {
    const result = aggregate(
      [event({ date: '2024-06-07', title: 'Late' }), event({ date: '2024-06-05', title: 'Early' })],
      { runDate: '2024-06-04' },
    );
    expect([...result.keys()]).toEqual(['2024-06-05', '2024-06-07']);
    expect(result.get('2024-06-05')?.map((e) => e.title)).toEqual(['Early']);
  });

  it('orders a day by source rank, then title, then link', () => {
    const result = aggregate(
      [
        event({ source: B, title: 'Alpha', link: 'https://b.example.com/1' }),
        event({ source: A, title: 'Zulu', link: 'https://a.example.com/9' }),
        event({ source: A, title: 'Mike', link: 'https://a.example.com/2' }),
        event({ source: A, title: 'Mike', link: 'https://a.example.com/1' }),
      ],
      { runDate: '2024-06-04', sourceOrder: [A, B] },
    );
    expect(result.get('2024-06-05')?.map((e) => `${e.title} ${e.link}`)).toEqual([
      'Mike https://a.example.com/1',
      'Mike https://a.example.com/2',
      'Zulu https://a.example.com/9',
      'Alpha https://b.example.com/1',
    ]);
  });

  it('ranks unknown sources by first appearance', () => {
    const result = aggregate([event({ source: B, title: 'Zed' }), event({ source: A, title: 'Abe' })], {
      runDate: '2024-06-04',
    });
    expect(result.get('2024-06-05')?.map((e) => e.title)).toEqual(['Zed', 'Abe']);
  });

  it('keeps one of two identical events', () => {
    const result = aggregate([event(), event()], { runDate: '2024-06-04' });
    expect(result.get('2024-06-05')).toHaveLength(1);
  });

  it('treats title case, whitespace and tracking params as the same listing', () => {
    const { events, stats } = aggregateWithStats(
      [
        event({ source: A }),
        event({ source: B, title: ' jazz   night', link: 'https://a.example.com/e/1?utm_source=feed' }),
      ],
      { runDate: '2024-06-04', sourceOrder: [A, B] },
    );
    expect(stats.duplicates).toBe(1);
    expect(events.get('2024-06-05')?.[0].source).toBe(A);
  });

  it('keeps the same listing on different dates', () => {
    const result = aggregate([event({ date: '2024-06-05' }), event({ date: '2024-06-12' })], {
      runDate: '2024-06-04',
    });
    expect(result.size).toBe(2);
  });

  it('drops past dates unless includePast is set', () => {
    const events = [event({ date: '2024-06-03', title: 'Yesterday' }), event({ date: '2024-06-04', title: 'Today' })];

    const { events: upcoming, stats } = aggregateWithStats(events, { runDate: '2024-06-04' });
    expect([...upcoming.keys()]).toEqual(['2024-06-04']);
    expect(stats.past).toBe(1);

    const all = aggregate(events, { runDate: '2024-06-04', includePast: true });
    expect([...all.keys()]).toEqual(['2024-06-03', '2024-06-04']);
  });

  it('is stable when fed its own output', () => {
    const first = aggregate(
      [event({ title: 'B' }), event({ title: 'A' }), event({ title: 'A' }), event({ date: '2024-06-09' })],
      { runDate: '2024-06-04' },
    );
    const second = aggregate([...first.values()].flat(), { runDate: '2024-06-04' });
    expect(second).toEqual(first);
  });

  it('gives the same result when the input is repeated', () => {
    const events = [
      event({ source: B, title: 'Poetry Slam', link: 'https://b.example.com/e/4', date: '2024-06-08' }),
      event({ title: 'Jazz Night', date: '2024-06-05' }),
      event({ source: B, title: 'Open Mic', link: 'https://b.example.com/e/2', date: '2024-06-05' }),
      event({ title: 'Jazz Night', date: '2024-06-06' }),
      event({ title: 'Organ Recital', link: 'https://a.example.com/e/3?utm_source=nl', date: '2024-06-08' }),
      event({ title: 'Old Show', date: '2024-06-01' }),
    ];
    const options = { runDate: '2024-06-04', sourceOrder: [A, B] };

    const once = aggregate(events, options);
    const twice = aggregate([...events, ...events], options);

    expect([...twice.keys()]).toEqual([...once.keys()]);
    expect([...twice.entries()]).toEqual([...once.entries()]);
    expect(once.get('2024-06-08')?.map((e) => e.title)).toEqual(['Organ Recital', 'Poetry Slam']);
  });

  it('counts input and output', () => {
    const { stats } = aggregateWithStats([event(), event(), event({ date: '2024-06-01' })], {
      runDate: '2024-06-04',
    });
    expect(stats).toEqual({ input: 3, duplicates: 1, past: 1, output: 1 });
  });

  it('returns an empty mapping for no events', () => {
    expect(aggregate([], { runDate: '2024-06-04' }).size).toBe(0);
  });
});
