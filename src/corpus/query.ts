import type { Article } from '../collectors/index.js';
import { writeJsonAtomic, type CategoryStore } from '../storage/category-store.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

// カテゴリ名 -> 記事一覧
export type Corpus = Map<string, Article[]>;

export interface CorpusMatch {
  category: string;
  article: Article;
}

export interface CorpusStatistics {
  totalArticles: number;
  totalCategories: number;
  categories: Record<string, number>;
  dateRange: { earliest: string | null; latest: string | null };
}

// 保存済みの全カテゴリを読み込む（破損ファイルは警告してスキップ）
export async function loadCorpus(store: CategoryStore): Promise<Corpus> {
  const corpus: Corpus = new Map();

  for (const category of await store.listCategories()) {
    const loaded = await store.load(category);
    if (loaded.kind === 'loaded') {
      corpus.set(category, loaded.articles);
    } else if (loaded.kind === 'corrupt') {
      logger.warn({ category, error: loaded.error }, 'カテゴリファイルを読み込めないためスキップします');
    }
  }

  logger.debug({ categories: corpus.size }, 'コーパスを読み込みました');
  return corpus;
}

function parseTimestamp(value: string): number | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

export function getStatistics(corpus: Corpus): CorpusStatistics {
  const categories: Record<string, number> = {};
  let totalArticles = 0;
  let earliest: number | null = null;
  let latest: number | null = null;

  for (const [category, articles] of corpus) {
    categories[category] = articles.length;
    totalArticles += articles.length;

    for (const article of articles) {
      const time = parseTimestamp(article.scraped_at);
      if (time === null) continue;
      if (earliest === null || time < earliest) earliest = time;
      if (latest === null || time > latest) latest = time;
    }
  }

  return {
    totalArticles,
    totalCategories: corpus.size,
    categories,
    dateRange: {
      earliest: earliest === null ? null : new Date(earliest).toISOString(),
      latest: latest === null ? null : new Date(latest).toISOString(),
    },
  };
}

// タイトルと本文を大文字小文字を区別せずに部分一致検索
export function searchArticles(corpus: Corpus, query: string, category?: string): CorpusMatch[] {
  const needle = query.toLowerCase();
  const results: CorpusMatch[] = [];

  for (const [name, articles] of corpus) {
    if (category && name !== category) continue;

    for (const article of articles) {
      if (article.title.toLowerCase().includes(needle) || article.text.toLowerCase().includes(needle)) {
        results.push({ category: name, article });
      }
    }
  }

  return results;
}

// scraped_at が範囲内（両端を含む）の記事
export function filterByDateRange(corpus: Corpus, from?: Date, to?: Date): CorpusMatch[] {
  const results: CorpusMatch[] = [];

  for (const [category, articles] of corpus) {
    for (const article of articles) {
      const time = parseTimestamp(article.scraped_at);
      if (time === null) continue;
      if (from && time < from.getTime()) continue;
      if (to && time > to.getTime()) continue;
      results.push({ category, article });
    }
  }

  return results;
}

export async function exportResults(results: readonly CorpusMatch[], outputPath: string): Promise<number> {
  await writeJsonAtomic(
    outputPath,
    results.map((r) => r.article)
  );
  logger.info({ count: results.length, path: outputPath }, '検索結果をエクスポートしました');
  return results.length;
}
