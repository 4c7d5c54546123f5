import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import Parser from 'rss-parser';
import { getConfig } from '../config.js';
import { FEED_SOURCES, MAX_CONTENT_CHARS, MIN_SUMMARY_CHARS } from '../constants/sources.js';
import { logger } from '../logger.js';
import type { Article, FeedSource } from '../types.js';

export interface FeedClientOptions {
  http?: Pick<AxiosInstance, 'get'>;
  timeoutMs?: number;
  itemCap?: number;
  enrichContent?: boolean;
  now?: () => Date;
}

/**
 * Pulls RSS/Atom feeds over HTTP and maps entries to raw articles.
 * A feed that fails to download or parse is logged and contributes nothing.
 */
export class FeedClient {
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly parser = new Parser();
  private readonly itemCap: number;
  private readonly enrichContent: boolean;
  private readonly now: () => Date;

  constructor(opts: FeedClientOptions = {}) {
    const cfg = getConfig();
    this.http =
      opts.http ??
      axios.create({
        timeout: opts.timeoutMs ?? cfg.httpTimeoutMs,
        responseType: 'text',
        headers: {
          'User-Agent': 'Mozilla/5.0 (compatible; MacroPulseBot/1.0)',
          'Accept-Language': 'en-US,en;q=0.9',
          Accept: 'application/rss+xml,application/atom+xml,application/xml;q=0.9,*/*;q=0.8',
        },
      });
    this.itemCap = opts.itemCap ?? cfg.feedItemCap;
    this.enrichContent = opts.enrichContent ?? cfg.enrichContent;
    this.now = opts.now ?? (() => new Date());
  }

  async fetchFeed(sourceName: string, feedUrl: string): Promise<Article[]> {
    try {
      const { data } = await this.http.get<string>(feedUrl);
      const feed = await this.parser.parseString(data);
      const scrapedAt = this.now().toISOString();
      return feed.items.slice(0, this.itemCap).map((item) => toArticle(item, sourceName, scrapedAt));
    } catch (err) {
      logger.error({ err, source: sourceName, feed: feedUrl }, 'Feed fetch failed');
      return [];
    }
  }

  /**
   * Download an article page and pull out its main text. Returns '' on any failure.
   */
  async fetchFullContent(url: string): Promise<string> {
    try {
      const { data } = await this.http.get<string>(url);
      return typeof data === 'string' ? extractArticleText(data) : '';
    } catch (err) {
      logger.warn({ reason: err instanceof Error ? err.message : String(err), url }, 'Full content fetch failed');
      return '';
    }
  }

  /**
   * Replace a short feed summary with the page text when the page yields any.
   */
  async enrichArticle(article: Article): Promise<Article> {
    if (article.content.length >= MIN_SUMMARY_CHARS || !article.link) return article;
    const full = await this.fetchFullContent(article.link);
    return full ? { ...article, content: full } : article;
  }

  async fetchSource(source: FeedSource): Promise<Article[]> {
    const articles: Article[] = [];
    for (const feed of source.feeds) {
      articles.push(...(await this.fetchFeed(source.name, feed)));
    }
    logger.info({ source: source.name, count: articles.length }, 'Fetched source');

    if (!this.enrichContent) return articles;
    const enriched: Article[] = [];
    for (const article of articles) {
      enriched.push(await this.enrichArticle(article));
    }
    return enriched;
  }

  /**
   * Every configured source in order, with cross-feed duplicates removed.
   */
  async fetchAllArticles(sources: readonly FeedSource[] = FEED_SOURCES): Promise<Article[]> {
    const all: Article[] = [];
    for (const source of sources) {
      all.push(...(await this.fetchSource(source)));
    }
    return deduplicateArticles(all);
  }
}

export function toArticle(item: Parser.Item, sourceName: string, scrapedAt: string): Article {
  const body = item.contentSnippet ?? item.summary ?? '';
  return {
    source: sourceName,
    title: (item.title ?? '').trim(),
    link: item.link ?? '',
    published_date: item.pubDate ?? item.isoDate ?? '',
    scrape_timestamp: scrapedAt,
    content: body.trim().slice(0, MAX_CONTENT_CHARS),
  };
}

const BOILERPLATE = 'script, style, nav, header, footer, aside, form';
const MIN_CANDIDATE_CHARS = 200;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Main text of an HTML page: boilerplate removed, then the first of <article>, an
 * "article-body" or "story-body" class, an id containing "article", or <main> that holds
 * more than 200 characters. Falls back to all <p> text. Capped at MAX_CONTENT_CHARS.
 */
export function extractArticleText(html: string): string {
  const $ = cheerio.load(html);
  $(BOILERPLATE).remove();
  // keep words from adjacent elements apart once text() concatenates them
  $('body *').each((_, el) => {
    $(el).prepend(' ').append(' ');
  });

  const withAttr = (attr: 'class' | 'id', needle: string) =>
    $(`[${attr}]`)
      .filter((_, el) => ($(el).attr(attr) ?? '').toLowerCase().includes(needle))
      .first();

  const candidates = [
    $('article').first(),
    withAttr('class', 'article-body'),
    withAttr('class', 'story-body'),
    withAttr('id', 'article'),
    $('main').first(),
  ];
  for (const candidate of candidates) {
    if (!candidate.length) continue;
    const text = collapse(candidate.text());
    if (text.length > MIN_CANDIDATE_CHARS) return text.slice(0, MAX_CONTENT_CHARS);
  }

  const paragraphs = $('p')
    .map((_, p) => collapse($(p).text()))
    .get()
    .filter(Boolean);
  return paragraphs.join(' ').slice(0, MAX_CONTENT_CHARS);
}

/**
 * Keep the first article per (link without query string, trimmed title).
 */
export function deduplicateArticles(articles: readonly Article[]): Article[] {
  const seen = new Set<string>();
  const unique: Article[] = [];
  for (const article of articles) {
    const key = `${article.link.split('?')[0]}\u0000${article.title.trim()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(article);
  }
  return unique;
}
