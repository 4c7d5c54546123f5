/**
 * Generic normalization and string helpers.
 * These utilities are used across scoring, storage, and data shaping.
 */

/**
 * Clamp a numeric value to [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a number to 2 decimal places. Returns a number (not string).
 */
export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

/**
 * Lowercase, drop everything outside [a-z0-9] and whitespace, collapse whitespace.
 * Accented letters and punctuation are removed, not transliterated.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(/[\r\n]+/g, ' ')
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Split normalized text into unigrams followed by every adjacent-word bigram.
 * Example: tokenize('rate hike looms') => ['rate', 'hike', 'looms', 'rate hike', 'hike looms']
 */
export function tokenize(text: string): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const bigrams: string[] = [];
  for (let i = 0; i < words.length - 1; i++) {
    bigrams.push(`${words[i]} ${words[i + 1]}`);
  }
  return [...words, ...bigrams];
}

/**
 * Lowercased title repeated `multiplier` times, each copy followed by a space, then the lowercased body.
 */
export function buildWeightedBlob(title: string, content: string, multiplier: number): string {
  return `${title.toLowerCase()} `.repeat(Math.max(0, multiplier)) + content.toLowerCase();
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Non-overlapping occurrences of `needle`, scanning left to right.
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/**
 * Canonical form of an article link used for dedup: trimmed, trailing slashes dropped, lowercased.
 */
export function normalizeLink(link?: string | null): string {
  if (!link) return '';
  return link.trim().replace(/\/+$/, '').toLowerCase();
}
