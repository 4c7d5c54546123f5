import { getConfig, type AppConfig } from '../config.js';
import { logger } from '../logger.js';
import type { RunCycleResult, TopArticlesResult } from '../schemas/articles.js';
import type { FeedSource, ScoringOptions } from '../types.js';
import { publishedDay } from '../utils/date.js';
import { normalizeLink } from '../utils/normalize.js';
import { AlertDispatcher } from './alerts.js';
import { renderDashboard, writeDashboard } from './renderer.js';
import { getTopArticles, scoreCorpus } from './scoring.js';
import { FeedClient } from './sources.js';
import { loadCorpusFile, saveCorpusFile, updateStorage } from './storage.js';

export interface CycleOptions {
  config?: AppConfig;
  feeds?: FeedClient;
  alerts?: AlertDispatcher;
  sources?: readonly FeedSource[];
  scoring?: Partial<ScoringOptions>;
  now?: Date;
}

/**
 * One scrape cycle: fetch → store (purge + dedup) → score the whole corpus → alert on new
 * arrivals → persist scores → render the dashboard. Meant to run hourly.
 */
export async function runCycle(opts: CycleOptions = {}): Promise<RunCycleResult> {
  const cfg = opts.config ?? getConfig();
  const feeds = opts.feeds ?? new FeedClient();
  const alerts = opts.alerts ?? new AlertDispatcher();
  const now = opts.now ?? new Date();

  logger.info('Scrape cycle starting');

  const fetched = await feeds.fetchAllArticles(opts.sources);
  logger.info({ count: fetched.length }, 'Fetched articles');

  if (!fetched.length) {
    logger.warn('No articles fetched; corpus left as is');
    const existing = await loadCorpusFile(cfg.dataFile, cfg.retentionDays);
    return {
      fetched: 0,
      added: 0,
      corpus_size: existing.articles.length,
      alert_threshold: existing.metadata.alert_threshold ?? null,
      alerts_triggered: 0,
      top_titles: [],
    };
  }

  const { corpus, added, file } = await updateStorage(fetched, {
    filePath: cfg.dataFile,
    retentionDays: cfg.retentionDays,
    now,
  });
  logger.info({ corpus: corpus.length, added: added.length }, 'Storage updated');

  const { articles, threshold } = scoreCorpus(added, corpus, opts.scoring);
  const top = getTopArticles(articles, cfg.topN);
  logger.info({ threshold, top: top.slice(0, 5).map((a) => a.title.slice(0, 50)) }, 'Corpus scored');

  const newLinks = new Set(added.map((a) => normalizeLink(a.link)));
  const alertsTriggered = await alerts.checkAndAlert(articles.filter((a) => newLinks.has(normalizeLink(a.link))));
  logger.info({ alertsTriggered }, 'Alerts checked');

  await saveCorpusFile(
    cfg.dataFile,
    {
      ...file,
      articles,
      metadata: { ...file.metadata, top_n: cfg.topN, alert_threshold: threshold },
    },
    now,
  );

  await writeDashboard(cfg.dashboardFile, renderDashboard(articles, top, { now, topN: cfg.topN }));

  logger.info('Scrape cycle complete');
  return {
    fetched: fetched.length,
    added: added.length,
    corpus_size: articles.length,
    alert_threshold: threshold,
    alerts_triggered: alertsTriggered,
    top_titles: top.map((a) => a.title),
  };
}

/**
 * Top of the stored corpus as last scored. Nothing is recomputed here.
 */
export async function readTopArticles(
  opts: { limit?: number; relevantOnly?: boolean; config?: AppConfig } = {},
): Promise<TopArticlesResult> {
  const cfg = opts.config ?? getConfig();
  const data = await loadCorpusFile(cfg.dataFile, cfg.retentionDays);
  const pool = opts.relevantOnly ? data.articles.filter((a) => a.is_relevant === true) : data.articles;

  return {
    last_updated: data.last_updated,
    corpus_size: data.articles.length,
    alert_threshold: data.metadata.alert_threshold ?? null,
    articles: getTopArticles(pool, opts.limit ?? cfg.topN).map((a) => ({
      title: a.title,
      link: a.link,
      source: a.source,
      published_day: publishedDay(a.published_date),
      score_normalized: a.score_normalized,
      sentiment_label: a.sentiment_label ?? null,
      themes: a.themes ?? [],
      matched_keywords: a.matched_keywords ?? [],
      is_relevant: a.is_relevant ?? false,
    })),
  };
}
