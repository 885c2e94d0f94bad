import type { Article, PageFetcher, RawPost } from '../collectors/index.js';
import { existingUrls } from '../storage/category-store.js';
import { decodeTitle, normalizeContent } from '../utils/html.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { truncateText } from '../utils/text.js';

export type StopReason = 'end' | 'transient-error' | 'max-pages';

export interface HarvestOptions {
  fetcher: PageFetcher;
  delayMs: number;
  maxPages: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}

export interface HarvestResult {
  articles: Article[];   // 既存記事 + 新規記事（取得順）
  newCount: number;
  invalidPosts: number;  // 形式不正でスキップされた投稿数
  pagesFetched: number;
  stopReason: StopReason;
}

export function buildArticle(post: RawPost, category: string, scrapedAt: Date): Article {
  return {
    url: post.link,
    title: decodeTitle(post.title?.rendered),
    text: normalizeContent(post.content?.rendered),
    categories: [category],
    page_id: post.id ?? null,
    scraped_at: scrapedAt.toISOString(),
  };
}

/**
 * 1カテゴリ分のページを順に取得し、未保存のURLだけを記事化する
 *
 * 既存のURL集合に含まれる投稿はスキップし、新しく作った記事のURLはその場で集合に加える
 * （同じ実行内でページをまたいで同じURLが出ても二重に保存しない）。
 * 終端・一時的なエラー・ページ上限のいずれかで停止し、それまでに作った記事は保持する。
 */
export async function harvestCategory(
  category: string,
  categoryId: number,
  existing: readonly Article[],
  options: HarvestOptions
): Promise<HarvestResult> {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? (() => new Date());
  const logger = (options.logger ?? getLogger()).child({ category });

  const knownUrls = existingUrls(existing);
  const newArticles: Article[] = [];
  let pagesFetched = 0;
  let invalidPosts = 0;
  let stopReason: StopReason = 'max-pages';

  logger.info({ categoryId, existing: existing.length }, 'カテゴリの収集を開始');

  for (let page = 1; page <= options.maxPages; page++) {
    const result = await options.fetcher.fetchPage(categoryId, page);
    pagesFetched++;

    if (result.kind === 'end') {
      logger.info({ page, reason: result.reason }, 'ページネーションの終端に到達');
      stopReason = 'end';
      break;
    }
    if (result.kind === 'transient-error') {
      logger.error({ page, error: result.reason }, 'ページ取得エラーのためこのカテゴリの収集を中断');
      stopReason = 'transient-error';
      break;
    }

    invalidPosts += result.skipped;
    let pageNew = 0;
    for (const post of result.posts) {
      if (knownUrls.has(post.link)) {
        continue;
      }

      const article = buildArticle(post, category, now());
      newArticles.push(article);
      knownUrls.add(article.url);
      pageNew++;

      logger.debug({ title: truncateText(article.title, 50) }, '記事を取得');
    }

    logger.info(
      { page, added: pageNew, received: result.posts.length, skipped: result.skipped },
      'ページの処理完了'
    );

    if (page === options.maxPages) {
      logger.warn({ maxPages: options.maxPages }, 'ページ数の上限に達したため収集を打ち切ります');
      break;
    }

    await wait(options.delayMs);
  }

  return {
    articles: [...existing, ...newArticles],
    newCount: newArticles.length,
    invalidPosts,
    pagesFetched,
    stopReason,
  };
}
