import { describe, expect, it } from 'vitest';
import { normalizeDate, parsePublishedDate, publishedDay } from '../src/utils/date.js';

describe('parsePublishedDate', () => {
  it('parses RFC 822 feed dates', () => {
    expect(parsePublishedDate('Mon, 01 Jan 2024 12:00:00 +0000')?.toISOString()).toBe('2024-01-01T12:00:00.000Z');
  });

  it('reads zone-less datetimes as UTC', () => {
    expect(parsePublishedDate('2024-03-05 08:30:00')?.toISOString()).toBe('2024-03-05T08:30:00.000Z');
  });

  it('falls back to natural language relative to now', () => {
    const parsed = parsePublishedDate('yesterday', new Date('2024-06-10T12:00:00Z'));
    expect(parsed).not.toBeNull();
    expect(parsed && normalizeDate(parsed)).toBe('2024-06-09');
  });

  it('returns null for empty or unparseable input', () => {
    expect(parsePublishedDate('')).toBeNull();
    expect(parsePublishedDate(undefined)).toBeNull();
    expect(parsePublishedDate('gibberish')).toBeNull();
  });
});

describe('publishedDay', () => {
  it('formats a UTC day or returns empty', () => {
    expect(publishedDay('Mon, 01 Jan 2024 23:30:00 +0000')).toBe('2024-01-01');
    expect(publishedDay('')).toBe('');
  });

  it('keeps the first ten characters of an unparseable date', () => {
    expect(publishedDay('not-a-real-timestamp')).toBe('not-a-real');
    expect(publishedDay('n/a')).toBe('');
  });
});
