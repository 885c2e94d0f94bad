import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { configSchema } from '../config/index.js';
import type { PageFetcher, PageResult } from '../collectors/index.js';
import { CategoryStore, StorageWriteError } from '../storage/category-store.js';
import { HarvestPipeline } from './index.js';

const NOW = new Date('2026-10-19T08:00:00.000Z');
const END: PageResult = { kind: 'end', reason: '空のページ' };

function posts(...ns: number[]): Extract<PageResult, { kind: 'posts' }> {
  return {
    kind: 'posts',
    posts: ns.map((n) => ({
      id: n,
      link: `https://news.example.com/${n}`,
      title: { rendered: `Наслов ${n}` },
      content: { rendered: `<p>Текст ${n}</p>` },
    })),
    skipped: 0,
  };
}

// カテゴリID -> ページ列 を返すフェイク
class CatalogFetcher implements PageFetcher {
  calls: [number, number][] = [];

  constructor(private pages: Record<number, PageResult[] | Error>) {}

  async fetchPage(categoryId: number, page: number): Promise<PageResult> {
    this.calls.push([categoryId, page]);
    const entry = this.pages[categoryId];
    if (entry instanceof Error) {
      throw entry;
    }
    return entry?.[page - 1] ?? END;
  }
}

describe('HarvestPipeline', () => {
  let tempDir: string;
  let store: CategoryStore;

  function pipeline(
    categories: Record<string, number>,
    fetcher: PageFetcher,
    onCorrupt: 'skip' | 'reset' = 'skip'
  ): HarvestPipeline {
    const config = configSchema.parse({
      api: { delayMs: 0 },
      categories,
      storage: { dataDir: tempDir, onCorrupt },
    });
    return new HarvestPipeline(config, { fetcher, store, now: () => NOW });
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'news-harvester-test-'));
    store = new CategoryStore(tempDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('新しいカテゴリの記事を取得順に保存する', async () => {
    const fetcher = new CatalogFetcher({ 83: [posts(1, 2), posts(3, 4), END] });

    const result = await pipeline({ sport: 83 }, fetcher).run();

    expect(result.added).toBe(4);
    expect(result.total).toBe(4);
    expect(result.failed).toEqual([]);
    expect(fetcher.calls).toHaveLength(3);

    const loaded = await store.load('sport');
    expect(loaded.kind).toBe('loaded');
    if (loaded.kind === 'loaded') {
      expect(loaded.articles.map((a) => a.url)).toEqual([
        'https://news.example.com/1',
        'https://news.example.com/2',
        'https://news.example.com/3',
        'https://news.example.com/4',
      ]);
      expect(loaded.articles[0]).toEqual({
        url: 'https://news.example.com/1',
        title: 'Наслов 1',
        text: 'Текст 1',
        categories: ['sport'],
        page_id: 1,
        scraped_at: '2026-10-19T08:00:00.000Z',
      });
    }
  });

  it('2回目の実行では新規0件で、ファイルの内容も変わらない', async () => {
    const pages = { 83: [posts(1, 2), posts(3, 4), END] };

    await pipeline({ sport: 83 }, new CatalogFetcher(pages)).run();
    const before = await fs.readFile(path.join(tempDir, 'sport.json'), 'utf-8');

    const second = await pipeline({ sport: 83 }, new CatalogFetcher(pages)).run();
    const after = await fs.readFile(path.join(tempDir, 'sport.json'), 'utf-8');

    expect(second.added).toBe(0);
    expect(second.total).toBe(4);
    expect(after).toBe(before);
  });

  it('既存記事の後に新規記事を追記する', async () => {
    await pipeline({ sport: 83 }, new CatalogFetcher({ 83: [posts(1), END] })).run();

    const result = await pipeline({ sport: 83 }, new CatalogFetcher({ 83: [posts(5, 1), END] })).run();

    expect(result.added).toBe(1);
    const loaded = await store.load('sport');
    if (loaded.kind !== 'loaded') throw new Error(`unexpected ${loaded.kind}`);
    expect(loaded.articles.map((a) => a.page_id)).toEqual([1, 5]);
  });

  it('1つのカテゴリが失敗しても他のカテゴリは収集する', async () => {
    const fetcher = new CatalogFetcher({ 1: new Error('unexpected failure'), 2: [posts(10, 11), END] });

    const result = await pipeline({ broken: 1, healthy: 2 }, fetcher).run();

    expect(result.failed).toEqual(['broken']);
    expect(result.added).toBe(2);
    expect(result.categories.map((c) => [c.category, c.status])).toEqual([
      ['broken', 'failed'],
      ['healthy', 'harvested'],
    ]);
    expect(await store.load('broken')).toEqual({ kind: 'not-found' });
  });

  it('一時的なエラーで止まったカテゴリもそれまでの記事を保存する', async () => {
    const fetcher = new CatalogFetcher({ 83: [posts(1, 2), { kind: 'transient-error', reason: 'HTTP 502' }] });

    const result = await pipeline({ sport: 83 }, fetcher).run();

    expect(result.categories[0]).toEqual({
      category: 'sport',
      status: 'harvested',
      added: 2,
      total: 2,
      pagesFetched: 2,
      invalidPosts: 0,
      stopReason: 'transient-error',
    });
    expect(result.failed).toEqual([]);
  });

  it('形式不正でスキップされた投稿数をカテゴリごとに集計する', async () => {
    const fetcher = new CatalogFetcher({ 83: [{ ...posts(1), skipped: 2 }, END] });

    const result = await pipeline({ sport: 83 }, fetcher).run();

    expect(result.categories[0]?.invalidPosts).toBe(2);
    expect(result.added).toBe(1);
  });

  it('既存ファイル内の重複URLは収集後の保存で1件にまとめる', async () => {
    const first = {
      url: 'https://news.example.com/1',
      title: 'Прв',
      text: '',
      categories: ['sport'],
      page_id: 1,
      scraped_at: '2026-10-01T00:00:00.000Z',
    };
    await fs.writeFile(path.join(tempDir, 'sport.json'), JSON.stringify([first, { ...first, title: 'Втор' }]), 'utf-8');

    const result = await pipeline({ sport: 83 }, new CatalogFetcher({ 83: [END] })).run();

    expect(result.total).toBe(1);
    const saved: unknown = JSON.parse(await fs.readFile(path.join(tempDir, 'sport.json'), 'utf-8'));
    expect(saved).toEqual([first]);
  });

  it('既存記事の未知のフィールドは収集後も保持する', async () => {
    const withAuthor = {
      url: 'https://news.example.com/1',
      title: 'Наслов 1',
      text: 'Текст 1',
      categories: ['sport'],
      page_id: 1,
      scraped_at: '2026-10-01T00:00:00.000Z',
      author: 'Уредник',
    };
    await fs.writeFile(path.join(tempDir, 'sport.json'), JSON.stringify([withAuthor]), 'utf-8');

    await pipeline({ sport: 83 }, new CatalogFetcher({ 83: [posts(2), END] })).run();

    const saved: unknown = JSON.parse(await fs.readFile(path.join(tempDir, 'sport.json'), 'utf-8'));
    expect(Array.isArray(saved) ? saved[0] : null).toEqual(withAuthor);
  });

    it('保存に失敗したカテゴリは失敗として記録し、既存ファイルを保持する', async () => {
    await store.save('sport', []);
    vi.spyOn(store, 'save').mockRejectedValueOnce(new StorageWriteError('sport', 'disk full'));
    const fetcher = new CatalogFetcher({ 83: [posts(1), END], 84: [posts(2), END] });

    const result = await pipeline({ sport: 83, kosarka: 84 }, fetcher).run();

    expect(result.failed).toEqual(['sport']);
    expect(await store.load('sport')).toEqual({ kind: 'loaded', articles: [] });
    expect(result.categories[1]?.added).toBe(1);
  });

  describe('破損したカテゴリファイル', () => {
    it('skipの場合は収集せず、ファイルも上書きしない', async () => {
      await fs.writeFile(path.join(tempDir, 'sport.json'), 'not json', 'utf-8');
      const fetcher = new CatalogFetcher({ 83: [posts(1), END] });

      const result = await pipeline({ sport: 83 }, fetcher, 'skip').run();

      expect(result.categories[0]?.status).toBe('skipped');
      expect(fetcher.calls).toEqual([]);
      expect(await fs.readFile(path.join(tempDir, 'sport.json'), 'utf-8')).toBe('not json');
    });

    it('resetの場合は退避してから空の状態で収集する', async () => {
      await fs.writeFile(path.join(tempDir, 'sport.json'), 'not json', 'utf-8');
      const fetcher = new CatalogFetcher({ 83: [posts(1), END] });

      const result = await pipeline({ sport: 83 }, fetcher, 'reset').run();

      expect(result.added).toBe(1);
      const files = await fs.readdir(tempDir);
      expect(files.sort()).toEqual(['sport.json', 'sport.json.corrupt-2026-10-19T08-00-00-000Z']);
      const loaded = await store.load('sport');
      expect(loaded.kind === 'loaded' ? loaded.articles.length : -1).toBe(1);
    });
  });

  it('指定したカテゴリのみ収集し、カタログにない名前は無視する', async () => {
    const fetcher = new CatalogFetcher({ 83: [posts(1), END], 84: [posts(2), END] });

    const result = await pipeline({ sport: 83, kosarka: 84 }, fetcher).run({ categories: ['kosarka', 'unknown'] });

    expect(result.categories.map((c) => c.category)).toEqual(['kosarka']);
    expect(fetcher.calls.every(([id]) => id === 84)).toBe(true);
  });

  it('initializeで保存先ディレクトリを作成する', async () => {
    const dataDir = path.join(tempDir, 'data');
    const config = configSchema.parse({ storage: { dataDir } });

    await new HarvestPipeline(config).initialize();

    expect((await fs.stat(dataDir)).isDirectory()).toBe(true);
  });

  it('保存先がディレクトリとして使えない場合はinitializeが失敗する', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory', 'utf-8');
    const config = configSchema.parse({ storage: { dataDir: blocker } });

    await expect(new HarvestPipeline(config).initialize()).rejects.toThrow();
  });
});
