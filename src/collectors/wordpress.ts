import { z } from 'zod';
import type { PageFetcher, PageResult } from './index.js';
import type { ApiConfig } from '../config/index.js';
import { getLogger } from '../utils/logger.js';

// WordPress REST API の投稿（必要なフィールドのみ）
export const rawPostSchema = z.object({
  id: z.union([z.number(), z.string()]).nullable().optional(),
  link: z.string().min(1),
  title: z.object({ rendered: z.string().optional() }).optional(),
  content: z.object({ rendered: z.string().optional() }).optional(),
});

export type RawPost = z.infer<typeof rawPostSchema>;

export type WordPressPageFetcherConfig = Pick<ApiConfig, 'baseUrl' | 'pageSize' | 'timeoutMs' | 'userAgent'>;

export class WordPressPageFetcher implements PageFetcher {
  private config: WordPressPageFetcherConfig;
  private logger = getLogger();

  constructor(config: WordPressPageFetcherConfig) {
    this.config = config;
  }

  buildUrl(categoryId: number, page: number): string {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set('categories', String(categoryId));
    url.searchParams.set('page', String(page));
    url.searchParams.set('per_page', String(this.config.pageSize));
    return url.toString();
  }

  async fetchPage(categoryId: number, page: number): Promise<PageResult> {
    const url = this.buildUrl(categoryId, page);

    let body: unknown;
    try {
      this.logger.debug({ url }, 'ページを取得中');

      const response = await fetch(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept': 'application/json',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      // 最終ページを超えるとWordPressは400（rest_post_invalid_page_number）を返す
      if (response.status === 400) {
        return { kind: 'end', reason: `HTTP 400 (page ${page})` };
      }
      if (!response.ok) {
        return { kind: 'transient-error', reason: `HTTP ${response.status}` };
      }

      body = await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return { kind: 'transient-error', reason: message };
    }

    if (!Array.isArray(body)) {
      return { kind: 'transient-error', reason: 'レスポンスが配列ではありません' };
    }
    if (body.length === 0) {
      return { kind: 'end', reason: '空のページ' };
    }

    const posts: RawPost[] = [];
    let skipped = 0;
    for (const item of body) {
      const parsed = rawPostSchema.safeParse(item);
      if (parsed.success) {
        posts.push(parsed.data);
      } else {
        skipped++;
        this.logger.warn({ categoryId, page, issues: parsed.error.issues.length }, '不正な形式の投稿をスキップ');
      }
    }

    return { kind: 'posts', posts, skipped };
  }
}
