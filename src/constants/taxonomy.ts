import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ThemeId } from '../types.js';

/**
 * Keyword taxonomy, sentiment lexicon and critical themes.
 * Read once from data/taxonomy/*.json at module load and frozen; nothing mutates them afterwards.
 */

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/constants and dist/constants both sit two levels under the project root
const TAXONOMY_DIR = path.resolve(__dirname, '..', '..', 'data', 'taxonomy');

const phraseKey = z
  .string()
  .min(1)
  .refine((k) => k === k.toLowerCase(), { message: 'phrases must be lowercase' });

const RelevanceTableSchema = z.record(phraseKey, z.number().positive());

// Sentiment keys are matched against normalized unigrams/bigrams, so only [a-z0-9] words joined by one space can ever hit.
const SentimentTableSchema = z.record(
  z.string().regex(/^[a-z0-9]+(?: [a-z0-9]+)?$/, 'sentiment phrases are one or two normalized words'),
  z.number(),
);

const ThemeTableSchema = z.array(
  z.object({
    id: z.string().min(1),
    label: z.string().min(1),
    triggers: z.array(phraseKey).min(1),
  }),
);

export interface WeightedPhrase {
  readonly phrase: string;
  readonly weight: number;
}

export interface CriticalTheme {
  readonly id: ThemeId;
  readonly label: string;
  readonly triggers: readonly string[];
}

function readTable<T>(file: string, schema: z.ZodType<T>): T {
  const raw = readFileSync(path.join(TAXONOMY_DIR, file), 'utf-8');
  return schema.parse(JSON.parse(raw));
}

/** Relevance phrases in declaration order; order decides which 15 matches are kept. */
export const RELEVANCE_TAXONOMY: readonly WeightedPhrase[] = Object.freeze(
  Object.entries(readTable('relevance.json', RelevanceTableSchema)).map(([phrase, weight]) =>
    Object.freeze({ phrase, weight }),
  ),
);

export const SENTIMENT_LEXICON: ReadonlyMap<string, number> = new Map(
  Object.entries(readTable('sentiment.json', SentimentTableSchema)),
);

export const CRITICAL_THEMES: readonly CriticalTheme[] = Object.freeze(
  readTable('themes.json', ThemeTableSchema).map((t) =>
    Object.freeze({ id: t.id, label: t.label, triggers: Object.freeze([...t.triggers]) }),
  ),
);

const THEME_LABELS = new Map(CRITICAL_THEMES.map((t) => [t.id, t.label]));

/**
 * Display label for a theme id; unknown ids (e.g. from an older corpus file) are shown as-is.
 */
export function themeLabel(id: ThemeId): string {
  return THEME_LABELS.get(id) ?? id;
}
