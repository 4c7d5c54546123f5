import { resolveScoringOptions } from '../constants/scoring.js';
import { SENTIMENT_LEXICON } from '../constants/taxonomy.js';
import { textField } from '../errors.js';
import type { ScoringOptions, SentimentLabel } from '../types.js';
import { buildWeightedBlob, normalizeText, round4, tokenize } from '../utils/normalize.js';

export interface SentimentAssessment {
  raw: number;
  transformed: number;
  label: SentimentLabel;
}

/**
 * sign(x) * sqrt(|x|). A raw score of 400 becomes 20, so keyword-dense long articles
 * do not swamp relevance when the two are blended.
 */
export function signedSqrt(raw: number): number {
  if (raw === 0) return 0;
  return Math.sign(raw) * Math.sqrt(Math.abs(raw));
}

/**
 * Bucket a raw (uncompressed) lexicon sum.
 */
export function sentimentLabel(raw: number): SentimentLabel {
  if (raw >= 100) return 'Extreme Positive';
  if (raw >= 10) return 'Positive';
  if (raw > -10) return 'Neutral';
  if (raw > -100) return 'Negative';
  return 'Extreme Negative';
}

export function scoreSentiment(
  title: unknown,
  content: unknown,
  overrides?: Partial<ScoringOptions>,
): SentimentAssessment {
  const opts = resolveScoringOptions(overrides);
  const blob = buildWeightedBlob(
    textField(title, 'title'),
    textField(content, 'content'),
    opts.titleWeightMultiplier,
  );

  const counts = new Map<string, number>();
  for (const token of tokenize(normalizeText(blob))) {
    if (SENTIMENT_LEXICON.has(token)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  let raw = 0;
  for (const [token, occurrences] of counts) {
    raw += (SENTIMENT_LEXICON.get(token) ?? 0) * occurrences;
  }

  return {
    raw: round4(raw),
    transformed: round4(signedSqrt(raw)),
    label: sentimentLabel(raw),
  };
}
