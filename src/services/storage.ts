import { promises as fs } from 'node:fs';
import path from 'node:path';
import { PipelineError } from '../errors.js';
import { logger } from '../logger.js';
import { CorpusFileSchema } from '../schemas/articles.js';
import type { Article, CorpusFile, StoredArticle } from '../types.js';
import { parsePublishedDate } from '../utils/date.js';
import { normalizeLink } from '../utils/normalize.js';

/**
 * Sliding-window persistence for the article corpus.
 * - JSON file on disk, written atomically (tmp file + rename)
 * - dedup by normalized link, within a batch and against what is stored
 * - purge of articles older than the retention window
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function emptyCorpusFile(retentionDays = 7): CorpusFile {
  return {
    articles: [],
    last_updated: '',
    metadata: {
      total_runs: 0,
      sources: [],
      retention_days: retentionDays,
    },
  };
}

/**
 * Load the corpus file. A missing file is a first run; an unreadable or invalid one is
 * logged and treated as empty so the cycle can rebuild it.
 */
export async function loadCorpusFile(filePath: string, retentionDays = 7): Promise<CorpusFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return emptyCorpusFile(retentionDays);
    logger.error({ err, filePath }, 'Failed to read corpus file');
    return emptyCorpusFile(retentionDays);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.error({ err, filePath }, 'Corpus file is not valid JSON');
    return emptyCorpusFile(retentionDays);
  }

  const parsed = CorpusFileSchema.safeParse(json);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues.slice(0, 5), filePath }, 'Corpus file failed validation');
    return emptyCorpusFile(retentionDays);
  }

  const data: CorpusFile = parsed.data;
  logger.info({ count: data.articles.length, filePath }, 'Loaded corpus');
  return data;
}

export async function saveCorpusFile(filePath: string, data: CorpusFile, now: Date = new Date()): Promise<CorpusFile> {
  const stamped: CorpusFile = { ...data, last_updated: now.toISOString() };
  const tmpPath = `${filePath}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(stamped, null, 2), 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new PipelineError(`Failed to save corpus to ${filePath}`, 'STORAGE_FAILED', err);
  }
  logger.info({ count: stamped.articles.length, filePath }, 'Saved corpus');
  return stamped;
}

/**
 * Drop articles published before now - retentionDays. The scrape timestamp stands in when the
 * published date is empty; articles whose date cannot be parsed at all are kept.
 */
export function purgeExpired<T extends Article>(articles: readonly T[], now: Date, retentionDays: number): T[] {
  const cutoff = now.getTime() - retentionDays * MS_PER_DAY;
  const fresh = articles.filter((article) => {
    const published = parsePublishedDate(article.published_date || article.scrape_timestamp, now);
    return published === null || published.getTime() >= cutoff;
  });

  const removed = articles.length - fresh.length;
  if (removed) {
    logger.info({ removed, retentionDays }, 'Purged expired articles');
  }
  return fresh;
}

export interface MergeResult {
  merged: StoredArticle[];
  added: Article[];
}

/**
 * Append incoming articles whose normalized link is non-empty and not yet seen.
 * The seen set grows as we go, so the same story from two feeds in one batch is added once.
 */
export function mergeNewArticles(existing: readonly StoredArticle[], incoming: readonly Article[]): MergeResult {
  const seen = new Set(existing.map((a) => normalizeLink(a.link)));
  const added: Article[] = [];

  for (const article of incoming) {
    const link = normalizeLink(article.link);
    if (!link || seen.has(link)) continue;
    seen.add(link);
    added.push(article);
  }

  logger.info({ added: added.length, skipped: incoming.length - added.length }, 'Merged new articles');
  return { merged: [...existing, ...added], added };
}

export interface StorageUpdate {
  /** Stored articles that survived the purge, before this batch. */
  corpus: StoredArticle[];
  /** Articles from this batch that were not stored before. */
  added: Article[];
  file: CorpusFile;
}

/**
 * One storage step of the cycle: load, purge, merge, bump run metadata, save.
 * Scores are not computed here; the caller scores `added` against `corpus` and saves again.
 */
export async function updateStorage(
  incoming: readonly Article[],
  opts: { filePath: string; retentionDays: number; now?: Date },
): Promise<StorageUpdate> {
  const now = opts.now ?? new Date();
  const data = await loadCorpusFile(opts.filePath, opts.retentionDays);
  const corpus = purgeExpired(data.articles, now, opts.retentionDays);
  const { merged, added } = mergeNewArticles(corpus, incoming);

  const file = await saveCorpusFile(
    opts.filePath,
    {
      articles: merged,
      last_updated: data.last_updated,
      metadata: {
        ...data.metadata,
        total_runs: data.metadata.total_runs + 1,
        sources: uniqueSources(merged),
        retention_days: opts.retentionDays,
      },
    },
    now,
  );

  return { corpus, added, file };
}

export function uniqueSources(articles: readonly Article[]): string[] {
  return Array.from(new Set(articles.map((a) => a.source).filter(Boolean))).sort();
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
