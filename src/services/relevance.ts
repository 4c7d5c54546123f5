import { resolveScoringOptions } from '../constants/scoring.js';
import { RELEVANCE_TAXONOMY } from '../constants/taxonomy.js';
import { textField } from '../errors.js';
import type { ScoringOptions } from '../types.js';
import { buildWeightedBlob, countOccurrences, round4, wordCount } from '../utils/normalize.js';

export interface RelevanceAssessment {
  score: number;
  matchedKeywords: string[];
}

/**
 * BM25 term-frequency saturation for a single phrase.
 * Repeated hits add less and less; long documents are damped relative to avgDocLen.
 */
export function bm25Saturation(
  count: number,
  docLen: number,
  opts: Pick<ScoringOptions, 'k1' | 'b' | 'avgDocLen'>,
): number {
  if (count <= 0) return 0;
  const { k1, b, avgDocLen } = opts;
  return (count * (k1 + 1)) / (count + k1 * (1 - b + (b * docLen) / avgDocLen));
}

/**
 * Score an article against the weighted macro taxonomy.
 * Title counts titleWeightMultiplier times. Phrases match as lowercase substrings,
 * so 'war' also hits inside 'warsaw'.
 */
export function scoreRelevance(
  title: unknown,
  content: unknown,
  overrides?: Partial<ScoringOptions>,
): RelevanceAssessment {
  const opts = resolveScoringOptions(overrides);
  const blob = buildWeightedBlob(
    textField(title, 'title'),
    textField(content, 'content'),
    opts.titleWeightMultiplier,
  );
  const docLen = wordCount(blob);

  let score = 0;
  const matchedKeywords: string[] = [];

  for (const { phrase, weight } of RELEVANCE_TAXONOMY) {
    const count = countOccurrences(blob, phrase);
    if (count > 0) {
      score += bm25Saturation(count, docLen, opts) * weight;
      matchedKeywords.push(phrase);
    }
  }

  return {
    score: round4(score),
    matchedKeywords: matchedKeywords.slice(0, opts.maxMatchedKeywords),
  };
}
