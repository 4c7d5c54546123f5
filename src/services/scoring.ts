import { FLAT_CORPUS_SCORE, RANGE_EPSILON, resolveScoringOptions } from '../constants/scoring.js';
import type {
  Article,
  ArticleScores,
  CorpusScores,
  RankedArticle,
  ScoredArticle,
  ScoringOptions,
  StoredArticle,
  ThemeId,
} from '../types.js';
import { clamp, round2, round4 } from '../utils/normalize.js';
import { scoreRelevance } from './relevance.js';
import { scoreSentiment } from './sentiment.js';
import { detectThemes } from './themes.js';

/**
 * Scoring pipeline:
 *   1. per article: relevance (BM25), sentiment (signed sqrt), themes (fixed boost), combined
 *   2. whole corpus: percentile-clipped rescale of combined to 0..100
 *   3. whole corpus: adaptive alert threshold and is_relevant flags
 *
 * Every function returns new objects; inputs are never mutated.
 */

export function combineScores(
  parts: { sentiment: number; relevance: number; boost: number },
  overrides?: Partial<ScoringOptions>,
): number {
  const opts = resolveScoringOptions(overrides);
  // sign is dropped: strongly good news is as salient as strongly bad news
  return round4(
    opts.sentimentWeight * Math.abs(parts.sentiment) +
      opts.relevanceWeight * parts.relevance +
      parts.boost,
  );
}

export function scoreArticle<T extends Article>(
  article: T,
  overrides?: Partial<ScoringOptions>,
): T & ArticleScores {
  const relevance = scoreRelevance(article.title, article.content, overrides);
  const sentiment = scoreSentiment(article.title, article.content, overrides);
  const themes = detectThemes(article.title, article.content, overrides);

  return {
    ...article,
    score_relevance: relevance.score,
    score_sentiment_raw: sentiment.raw,
    score_sentiment: sentiment.transformed,
    sentiment_label: sentiment.label,
    theme_boost: themes.boost,
    score_combined: combineScores(
      { sentiment: sentiment.transformed, relevance: relevance.score, boost: themes.boost },
      overrides,
    ),
    themes: themes.themes,
    matched_keywords: relevance.matchedKeywords,
  };
}

/**
 * Floor-indexed percentile into an ascending list of n values (no interpolation).
 */
export function percentileIndex(q: number, n: number): number {
  if (n <= 0) return 0;
  return clamp(Math.floor(q * n), 0, n - 1);
}

/**
 * Rescale score_combined across the whole corpus into 0..100, anchored on the
 * lower/upper percentiles so a few outliers cannot squash everyone else.
 * The result is only meaningful for this exact corpus snapshot.
 */
export function normalizeCorpus<T extends { score_combined: number }>(
  corpus: readonly T[],
  overrides?: Partial<ScoringOptions>,
): Array<T & { score_normalized: number }> {
  if (!corpus.length) return [];
  const opts = resolveScoringOptions(overrides);

  const sorted = corpus.map((a) => a.score_combined).sort((a, b) => a - b);
  const low = sorted[percentileIndex(opts.lowerPercentile, sorted.length)];
  const high = sorted[percentileIndex(opts.upperPercentile, sorted.length)];
  const range = Math.max(high - low, RANGE_EPSILON);

  return corpus.map((article) => ({
    ...article,
    score_normalized:
      high === low
        ? FLAT_CORPUS_SCORE
        : round2(clamp(((article.score_combined - low) / range) * 100, 0, 100)),
  }));
}

/**
 * mean + k * std (population) of the normalized scores, capped so something can still alert.
 */
export function computeAlertThreshold(
  corpus: readonly { score_normalized: number }[],
  overrides?: Partial<ScoringOptions>,
): number {
  const opts = resolveScoringOptions(overrides);
  if (!corpus.length) return opts.defaultThreshold;

  const scores = corpus.map((a) => a.score_normalized);
  const mean = scores.reduce((a, b) => a + b, 0) / scores.length;
  const variance = scores.reduce((a, s) => a + (s - mean) * (s - mean), 0) / scores.length;
  const threshold = mean + opts.thresholdMultiplier * Math.sqrt(variance);

  return round2(Math.min(threshold, opts.thresholdCap));
}

/**
 * A critical theme alone is enough to make an article relevant.
 */
export function applyThreshold<T extends { score_normalized: number; themes: readonly ThemeId[] }>(
  corpus: readonly T[],
  threshold: number,
): Array<T & Pick<CorpusScores, 'is_relevant' | 'alert_threshold'>> {
  return corpus.map((article) => ({
    ...article,
    is_relevant: article.score_normalized >= threshold || article.themes.length > 0,
    alert_threshold: threshold,
  }));
}

export function hasArticleScores(article: StoredArticle): article is ScoredArticle {
  return (
    typeof article.score_combined === 'number' &&
    typeof article.score_relevance === 'number' &&
    typeof article.score_sentiment === 'number' &&
    typeof article.score_sentiment_raw === 'number' &&
    typeof article.sentiment_label === 'string' &&
    typeof article.theme_boost === 'number' &&
    Array.isArray(article.themes) &&
    Array.isArray(article.matched_keywords)
  );
}

export interface CorpusScoringResult {
  articles: RankedArticle[];
  threshold: number;
}

/**
 * Score the new arrivals, append them to the corpus and recompute every
 * corpus-relative field. Corpus entries that already carry per-article scores keep them;
 * entries without (older files) are scored here.
 */
export function scoreCorpus(
  newArticles: readonly Article[],
  corpus: readonly StoredArticle[],
  overrides?: Partial<ScoringOptions>,
): CorpusScoringResult {
  const scored: ScoredArticle[] = [
    ...corpus.map((a) => (hasArticleScores(a) ? a : scoreArticle(a, overrides))),
    ...newArticles.map((a) => scoreArticle(a, overrides)),
  ];

  const normalized = normalizeCorpus(scored, overrides);
  const threshold = computeAlertThreshold(normalized, overrides);

  return {
    articles: applyThreshold(normalized, threshold),
    threshold,
  };
}

/**
 * Highest normalized scores first; ties keep corpus order.
 */
export function getTopArticles<T extends { score_normalized?: number }>(
  articles: readonly T[],
  topN = 20,
): Array<T & { score_normalized: number }> {
  const ranked: Array<T & { score_normalized: number }> = [];
  for (const article of articles) {
    const score = article.score_normalized;
    if (typeof score === 'number') ranked.push({ ...article, score_normalized: score });
  }
  return ranked.sort((a, b) => b.score_normalized - a.score_normalized).slice(0, Math.max(0, topN));
}
