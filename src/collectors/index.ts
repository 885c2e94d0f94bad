import type { RawPost } from './wordpress.js';

// 保存される記事（ファイル形式の互換性のためフィールド名は固定）
export interface Article {
  url: string;              // 記事URL（重複判定キー）
  title: string;            // タイトル（エンティティ復号済み）
  text: string;             // 正規化済み本文（空の場合あり）
  categories: string[];     // 所属カテゴリ名
  page_id: number | string | null; // 取得元の投稿ID
  scraped_at: string;       // 取得日時（ISO-8601, UTC）
}

// 1ページ分の取得結果
export type PageResult =
  | { kind: 'posts'; posts: RawPost[]; skipped: number }
  | { kind: 'end'; reason: string }
  | { kind: 'transient-error'; reason: string };

// ページ取得インターフェース
export interface PageFetcher {
  fetchPage(categoryId: number, page: number): Promise<PageResult>;
}

export { WordPressPageFetcher, rawPostSchema, type RawPost, type WordPressPageFetcherConfig } from './wordpress.js';
