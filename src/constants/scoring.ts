import type { ScoringOptions } from '../types.js';

/**
 * Calibration constants for the scoring pipeline.
 * avgDocLen is fixed for news-length text and is not derived from the corpus.
 */
export const DEFAULT_SCORING_OPTIONS: Readonly<ScoringOptions> = Object.freeze({
  // BM25 saturation
  k1: 1.5,
  b: 0.75,
  avgDocLen: 500,

  titleWeightMultiplier: 3,

  // combined = sentimentWeight * |sentiment| + relevanceWeight * relevance + boost
  sentimentWeight: 0.4,
  relevanceWeight: 0.6,
  themeBoost: 5.0,

  // threshold = min(mean + thresholdMultiplier * std, thresholdCap)
  thresholdMultiplier: 1.5,
  thresholdCap: 95.0,
  defaultThreshold: 75.0,

  lowerPercentile: 0.05,
  upperPercentile: 0.95,

  maxMatchedKeywords: 15,
});

/** Lower bound on the p95 - p5 range used as the normalization divisor. */
export const RANGE_EPSILON = 0.001;

/** Score given to every article when p5 and p95 coincide. */
export const FLAT_CORPUS_SCORE = 50.0;

export function resolveScoringOptions(overrides?: Partial<ScoringOptions>): ScoringOptions {
  return { ...DEFAULT_SCORING_OPTIONS, ...overrides };
}
