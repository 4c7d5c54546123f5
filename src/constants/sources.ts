import type { FeedSource } from '../types.js';

/**
 * Feeds polled on every cycle, grouped by publisher.
 * Add a publisher by appending an entry; order decides which copy of a duplicate story is kept.
 */
export const FEED_SOURCES: readonly FeedSource[] = [
  {
    name: 'Bloomberg',
    feeds: [
      'https://feeds.bloomberg.com/markets/news.rss',
      'https://feeds.bloomberg.com/economics/news.rss',
      'https://feeds.bloomberg.com/politics/news.rss',
    ],
  },
  {
    name: 'Economist',
    feeds: [
      'https://www.economist.com/finance-and-economics/rss.xml',
      'https://www.economist.com/business/rss.xml',
      'https://www.economist.com/international/rss.xml',
    ],
  },
];

/** Body text is capped so a single long page cannot dominate the corpus file. */
export const MAX_CONTENT_CHARS = 8000;

/** Feed summaries shorter than this are replaced by the article page text when enrichment is on. */
export const MIN_SUMMARY_CHARS = 300;
