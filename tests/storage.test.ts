import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PipelineError } from '../src/errors.js';
import {
  emptyCorpusFile,
  loadCorpusFile,
  mergeNewArticles,
  purgeExpired,
  saveCorpusFile,
  uniqueSources,
  updateStorage,
} from '../src/services/storage.js';
import type { Article } from '../src/types.js';

const NOW = new Date('2024-06-10T00:00:00Z');

function article(link: string, published_date = '2024-06-09T00:00:00Z', source = 'Test Wire'): Article {
  return {
    source,
    title: `Story at ${link}`,
    link,
    published_date,
    scrape_timestamp: '2024-06-09T01:00:00Z',
    content: '',
  };
}

describe('corpus file', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'macro-pulse-'));
    file = path.join(dir, 'corpus.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file is missing', async () => {
    expect(await loadCorpusFile(file, 5)).toEqual(emptyCorpusFile(5));
  });

  it('round-trips through an atomic write', async () => {
    const saved = await saveCorpusFile(
      path.join(dir, 'nested', 'corpus.json'),
      { ...emptyCorpusFile(), articles: [article('https://x.test/a')] },
      NOW,
    );
    expect(saved.last_updated).toBe('2024-06-10T00:00:00.000Z');

    const loaded = await loadCorpusFile(path.join(dir, 'nested', 'corpus.json'));
    expect(loaded).toEqual(saved);
    expect(await fs.readdir(path.join(dir, 'nested'))).toEqual(['corpus.json']);
  });

  it('treats invalid JSON as an empty corpus', async () => {
    await fs.writeFile(file, '{ not json', 'utf-8');
    expect(await loadCorpusFile(file)).toEqual(emptyCorpusFile());
  });

  it('treats a file with the wrong shape as an empty corpus', async () => {
    await fs.writeFile(file, JSON.stringify({ articles: 'nope' }), 'utf-8');
    expect(await loadCorpusFile(file)).toEqual(emptyCorpusFile());
  });

  it('fills defaults for older records', async () => {
    await fs.writeFile(file, JSON.stringify({ articles: [{ title: 'Old', link: 'https://x.test/old' }] }), 'utf-8');
    const loaded = await loadCorpusFile(file);
    expect(loaded.articles).toEqual([
      {
        source: '',
        title: 'Old',
        link: 'https://x.test/old',
        published_date: '',
        scrape_timestamp: '',
        content: '',
      },
    ]);
    expect(loaded.metadata).toEqual({ total_runs: 0, sources: [], retention_days: 7 });
  });

  it('raises a PipelineError when the target cannot be written', async () => {
    await fs.mkdir(file);
    await expect(saveCorpusFile(file, emptyCorpusFile(), NOW)).rejects.toBeInstanceOf(PipelineError);
    expect(await fs.readdir(dir)).toEqual(['corpus.json']);
  });

  it('updates storage across runs', async () => {
    const first = await updateStorage([article('https://x.test/a', undefined, 'Wire B'), article('https://x.test/b', undefined, 'Wire A')], {
      filePath: file,
      retentionDays: 7,
      now: NOW,
    });
    expect(first.corpus).toEqual([]);
    expect(first.added.map((a) => a.link)).toEqual(['https://x.test/a', 'https://x.test/b']);
    expect(first.file.metadata).toEqual({ total_runs: 1, sources: ['Wire A', 'Wire B'], retention_days: 7 });

    const second = await updateStorage([article('https://X.test/a/'), article('https://x.test/c')], {
      filePath: file,
      retentionDays: 7,
      now: NOW,
    });
    expect(second.corpus.map((a) => a.link)).toEqual(['https://x.test/a', 'https://x.test/b']);
    expect(second.added.map((a) => a.link)).toEqual(['https://x.test/c']);
    expect(second.file.metadata.total_runs).toBe(2);

    const stored = await loadCorpusFile(file);
    expect(stored.articles.map((a) => a.link)).toEqual(['https://x.test/a', 'https://x.test/b', 'https://x.test/c']);
  });
});

describe('purgeExpired', () => {
  it('drops articles outside the retention window', () => {
    const kept = purgeExpired(
      [
        article('https://x.test/old', '2024-06-01T00:00:00Z'),
        article('https://x.test/edge', '2024-06-03T00:00:00Z'),
        article('https://x.test/recent', 'Wed, 05 Jun 2024 10:00:00 GMT'),
        article('https://x.test/unknown', 'gibberish'),
      ],
      NOW,
      7,
    );
    expect(kept.map((a) => a.link)).toEqual(['https://x.test/edge', 'https://x.test/recent', 'https://x.test/unknown']);
  });

  it('falls back to the scrape time when there is no published date', () => {
    const stale = { ...article('https://x.test/stale', ''), scrape_timestamp: '2024-05-01T00:00:00Z' };
    const fresh = { ...article('https://x.test/fresh', ''), scrape_timestamp: '2024-06-09T00:00:00Z' };
    expect(purgeExpired([stale, fresh], NOW, 7).map((a) => a.link)).toEqual(['https://x.test/fresh']);
  });
});

describe('mergeNewArticles', () => {
  it('skips links already stored, repeated in the batch, or empty', () => {
    const existing = [article('https://x.test/a/')];
    const { merged, added } = mergeNewArticles(existing, [
      article('https://X.test/a'),
      article('https://x.test/b'),
      article('https://x.test/b'),
      article(''),
      article('https://x.test/c'),
    ]);
    expect(added.map((a) => a.link)).toEqual(['https://x.test/b', 'https://x.test/c']);
    expect(merged).toHaveLength(3);
    expect(existing).toHaveLength(1);
  });
});

describe('uniqueSources', () => {
  it('lists distinct non-empty sources in order', () => {
    expect(uniqueSources([article('a', '', 'B'), article('b', '', 'A'), article('c', '', 'B'), article('d', '', '')])).toEqual([
      'A',
      'B',
    ]);
  });
});
