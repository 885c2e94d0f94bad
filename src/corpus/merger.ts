import type { Article } from '../collectors/index.js';
import type { CategoryMergePolicy } from '../config/index.js';

export interface CorpusSource {
  name: string;
  articles: readonly Article[];
}

export interface SourceStats {
  original: number;
  unique: number;
}

export interface MergeResult {
  articles: Article[];
  stats: Record<string, SourceStats>;
  duplicates: number;
}

function cloneArticle(article: Article): Article {
  return { ...article, categories: [...article.categories] };
}

/**
 * 複数のカテゴリの記事をURLで重複排除して1つにまとめる
 *
 * ソースは名前順に処理し、URLごとに最初に出現した記事を残す。
 * `union` の場合は重複した記事のカテゴリを残した記事に追加する。
 * 入力は変更しない。
 */
export function mergeCollections(
  sources: readonly CorpusSource[],
  policy: CategoryMergePolicy = 'union'
): MergeResult {
  const ordered = [...sources].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const byUrl = new Map<string, Article>();
  const stats: Record<string, SourceStats> = {};
  let duplicates = 0;

  for (const source of ordered) {
    let unique = 0;

    for (const article of source.articles) {
      if (!article.url) continue;

      const kept = byUrl.get(article.url);
      if (!kept) {
        byUrl.set(article.url, cloneArticle(article));
        unique++;
        continue;
      }

      duplicates++;
      if (policy === 'union') {
        for (const category of article.categories) {
          if (!kept.categories.includes(category)) {
            kept.categories.push(category);
          }
        }
      }
    }

    const previous = stats[source.name];
    stats[source.name] = {
      original: (previous?.original ?? 0) + source.articles.length,
      unique: (previous?.unique ?? 0) + unique,
    };
  }

  return { articles: [...byUrl.values()], stats, duplicates };
}
