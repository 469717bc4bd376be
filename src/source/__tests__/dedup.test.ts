import { describe, it, expect } from 'vitest';
import { cleanLink, eventDedupKey, normalizeTitle, normalizeUrl } from '../dedup.js';

describe('cleanLink', () => {
  it('resolves relative links and strips tracking params and fragment', () => {
    expect(cleanLink('/events/1?utm_source=x&id=3#top', 'https://venue.example.com/list')).toBe(
      'https://venue.example.com/events/1?id=3',
    );
  });

  it('drops the query entirely when only tracking params remain', () => {
    expect(cleanLink('https://tickets.example.com/c?fbclid=abc', 'https://venue.example.com/')).toBe(
      'https://tickets.example.com/c',
    );
  });

  it('keeps parameters that only start like tracking keys', () => {
    expect(cleanLink('https://tickets.example.com/show?sourceId=42&reference=7&id=1&ref=home', 'https://venue.example.com/')).toBe(
      'https://tickets.example.com/show?sourceId=42&reference=7&id=1',
    );
  });

  it('returns null for non-http links', () => {
    expect(cleanLink('mailto:info@example.com', 'https://venue.example.com/')).toBeNull();
    expect(cleanLink('javascript:void(0)', 'https://venue.example.com/')).toBeNull();
  });
});

describe('normalizeUrl', () => {
  it('strips www, trailing slashes and tracking params, and sorts the query', () => {
    expect(normalizeUrl('https://www.example.com/a/?b=2&a=1&utm_medium=x')).toBe('https://example.com/a?a=1&b=2');
  });

  it('drops a bare root path', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
  });

  it('keeps the port', () => {
    expect(normalizeUrl('http://example.com:8080/x')).toBe('http://example.com:8080/x');
  });

  it('returns unparseable input trimmed', () => {
    expect(normalizeUrl('  not a url ')).toBe('not a url');
  });
});

describe('normalizeTitle', () => {
  it('collapses whitespace and lowercases', () => {
    expect(normalizeTitle('  Jazz\n  NIGHT ')).toBe('jazz night');
  });
});

describe('eventDedupKey', () => {
  it('combines date, normalized title and normalized link', () => {
    expect(eventDedupKey({ date: '2024-06-05', title: ' Jazz  Night', link: 'https://www.example.com/e/' })).toBe(
      '2024-06-05|jazz night|https://example.com/e',
    );
  });

  it('matches listings that differ only in tracking params', () => {
    const a = eventDedupKey({ date: '2024-06-05', title: 'Jazz Night', link: 'https://example.com/e?utm_source=fb' });
    const b = eventDedupKey({ date: '2024-06-05', title: 'jazz night', link: 'https://example.com/e' });
    expect(a).toBe(b);
  });

  it('tells apart listings whose links differ in a reference number', () => {
    const a = eventDedupKey({ date: '2024-06-05', title: 'Jazz Night', link: 'https://example.com/e?referenceNo=1' });
    const b = eventDedupKey({ date: '2024-06-05', title: 'Jazz Night', link: 'https://example.com/e?referenceNo=2' });
    expect(a).not.toBe(b);
  });
});
