/**
 * Shared types for Macro Pulse.
 * Field names on stored articles stay snake_case so the corpus file keeps one shape end to end.
 */

export type ThemeId = string;

export type SentimentLabel =
  | 'Extreme Positive'
  | 'Positive'
  | 'Neutral'
  | 'Negative'
  | 'Extreme Negative';

export type AlertReason = 'score' | 'theme' | 'both';

export interface Article {
  source: string;
  title: string;
  link: string;
  published_date: string; // free-form, as the feed gave it
  scrape_timestamp: string; // ISO-8601
  content: string; // <= 8000 chars
}

/** Per-article fields computed without looking at the rest of the corpus. */
export interface ArticleScores {
  score_relevance: number;
  score_sentiment_raw: number;
  score_sentiment: number;
  sentiment_label: SentimentLabel;
  theme_boost: number;
  score_combined: number;
  themes: ThemeId[];
  matched_keywords: string[]; // 0..15
}

/** Corpus-relative fields, recomputed on every run. */
export interface CorpusScores {
  score_normalized: number; // 0..100
  is_relevant: boolean;
  alert_threshold: number;
}

export type ScoredArticle = Article & ArticleScores;

export type RankedArticle = ScoredArticle & CorpusScores;

/** What the store hands back: legacy records may lack some or all score fields. */
export type StoredArticle = Article & Partial<ArticleScores> & Partial<CorpusScores>;

export interface ScoringOptions {
  k1: number;
  b: number;
  avgDocLen: number;
  titleWeightMultiplier: number;
  sentimentWeight: number;
  relevanceWeight: number;
  themeBoost: number;
  thresholdMultiplier: number;
  thresholdCap: number;
  lowerPercentile: number;
  upperPercentile: number;
  defaultThreshold: number;
  maxMatchedKeywords: number;
}

export interface FeedSource {
  name: string;
  feeds: readonly string[];
}

export interface CorpusMetadata {
  total_runs: number;
  sources: string[];
  retention_days: number;
  top_n?: number;
  alert_threshold?: number | null;
}

export interface CorpusFile {
  articles: StoredArticle[];
  last_updated: string;
  metadata: CorpusMetadata;
}
