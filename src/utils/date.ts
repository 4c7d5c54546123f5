import * as chrono from 'chrono-node';

const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

/**
 * Normalize a Date or date-like string to YYYY-MM-DD in UTC.
 */
export function normalizeDate(input: Date | string): string {
  const d = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${input}`);
  }
  // Convert to YYYY-MM-DD in UTC
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Best-effort parse of a feed date. Handles RFC 822 ("Mon, 01 Jan 2024 12:00:00 +0000"),
 * ISO-8601 and looser phrasings via chrono-node. Dates without a zone are read as UTC.
 * Returns null when nothing sensible comes out.
 */
export function parsePublishedDate(input: string | null | undefined, now: Date = new Date()): Date | null {
  const text = (input ?? '').trim();
  if (!text) return null;

  const candidate = NAIVE_DATETIME.test(text) ? `${text.replace(' ', 'T')}Z` : text;
  const direct = new Date(candidate);
  if (!Number.isNaN(direct.getTime())) return direct;

  return chrono.parseDate(text, { instant: now, timezone: 'UTC' }) ?? null;
}

/**
 * YYYY-MM-DD for a feed date. Unparseable input keeps its first 10 characters; shorter input yields ''.
 */
export function publishedDay(input: string | null | undefined): string {
  const parsed = parsePublishedDate(input);
  if (parsed) return normalizeDate(parsed);
  const text = (input ?? '').trim();
  return text.length >= 10 ? text.slice(0, 10) : '';
}
