import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const SentimentLabelSchema = z.enum([
  'Extreme Positive',
  'Positive',
  'Neutral',
  'Negative',
  'Extreme Negative',
]);

/**
 * One article as persisted in the corpus file. Unknown keys are dropped on load;
 * score fields are optional because older records may predate them.
 */
export const StoredArticleSchema = z.object({
  source: z.string().default(''),
  title: z.string().default(''),
  link: z.string().default(''),
  published_date: z.string().default(''),
  scrape_timestamp: z.string().default(''),
  content: z.string().default(''),
  score_relevance: z.number().optional(),
  score_sentiment_raw: z.number().optional(),
  score_sentiment: z.number().optional(),
  sentiment_label: SentimentLabelSchema.optional(),
  theme_boost: z.number().optional(),
  score_combined: z.number().optional(),
  score_normalized: z.number().min(0).max(100).optional(),
  themes: z.array(z.string()).optional(),
  matched_keywords: z.array(z.string()).optional(),
  is_relevant: z.boolean().optional(),
  alert_threshold: z.number().optional(),
});

export const CorpusFileSchema = z.object({
  articles: z.array(StoredArticleSchema).default([]),
  last_updated: z.string().default(''),
  metadata: z
    .object({
      total_runs: z.number().int().nonnegative().default(0),
      sources: z.array(z.string()).default([]),
      retention_days: z.number().int().positive().default(7),
      top_n: z.number().int().positive().optional(),
      alert_threshold: z.number().nullable().optional(),
    })
    .default({}),
});

export const ScoreArticleInputSchema = z.object({
  title: z.string().min(1),
  content: z.string().default(''),
});

export const TopArticlesInputSchema = z.object({
  limit: z.number().int().min(1).max(100).optional(),
  relevantOnly: z.boolean().default(false),
});

export const ScoreArticleResultSchema = z.object({
  score_relevance: z.number(),
  score_sentiment_raw: z.number(),
  score_sentiment: z.number(),
  sentiment_label: SentimentLabelSchema,
  theme_boost: z.number(),
  score_combined: z.number(),
  themes: z.array(z.string()),
  theme_labels: z.array(z.string()),
  matched_keywords: z.array(z.string()),
});

const TopArticleSchema = z.object({
  title: z.string(),
  link: z.string(),
  source: z.string(),
  published_day: z.string(),
  score_normalized: z.number(),
  sentiment_label: SentimentLabelSchema.nullable(),
  themes: z.array(z.string()),
  matched_keywords: z.array(z.string()),
  is_relevant: z.boolean(),
});

export const TopArticlesResultSchema = z.object({
  last_updated: z.string(),
  corpus_size: z.number().int().nonnegative(),
  alert_threshold: z.number().nullable(),
  articles: z.array(TopArticleSchema),
});

export const RunCycleResultSchema = z.object({
  fetched: z.number().int().nonnegative(),
  added: z.number().int().nonnegative(),
  corpus_size: z.number().int().nonnegative(),
  alert_threshold: z.number().nullable(),
  alerts_triggered: z.number().int().nonnegative(),
  top_titles: z.array(z.string()),
});

export type TopArticlesResult = z.infer<typeof TopArticlesResultSchema>;
export type RunCycleResult = z.infer<typeof RunCycleResultSchema>;

/**
 * MCP tool schemas must be plain `type: object` JSON Schemas without $ref indirection.
 */
export interface ToolJsonSchema {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, unknown>;
  required: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toToolSchema(schema: z.ZodTypeAny): ToolJsonSchema {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties = 'properties' in json && isRecord(json.properties) ? json.properties : {};
  const required =
    'required' in json && Array.isArray(json.required)
      ? json.required.filter((r): r is string => typeof r === 'string')
      : [];
  return { type: 'object', properties, required };
}
