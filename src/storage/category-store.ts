import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Article } from '../collectors/index.js';
import { getLogger } from '../utils/logger.js';

// 保存ファイルの記事形式（未知のフィールドは書き戻し時に保持する）
const storedArticleSchema = z.object({
  url: z.string().min(1),
  title: z.string().default(''),
  text: z.string().default(''),
  categories: z.array(z.string()).default([]),
  page_id: z.union([z.number(), z.string()]).nullable().default(null),
  scraped_at: z.string().default(''),
}).passthrough();

const storedCollectionSchema = z.array(storedArticleSchema);

export type StoreLoadResult =
  | { kind: 'loaded'; articles: Article[] }
  | { kind: 'not-found' }
  | { kind: 'corrupt'; error: string };

export class StorageWriteError extends Error {
  readonly category: string;

  constructor(category: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageWriteError';
    this.category = category;
  }
}

export function existingUrls(articles: readonly Article[]): Set<string> {
  return new Set(articles.map((a) => a.url));
}

// JSONを一時ファイルに書き出してからリネームする（途中で失敗しても既存ファイルは壊れない）
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * カテゴリごとの記事ファイル（<dataDir>/<category>.json）を扱う
 */
export class CategoryStore {
  readonly dataDir: string;
  private logger = getLogger();

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  filePath(category: string): string {
    return path.join(this.dataDir, `${category}.json`);
  }

  async load(category: string): Promise<StoreLoadResult> {
    const filePath = this.filePath(category);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.debug({ category }, 'カテゴリファイルが存在しないため空として扱います');
        return { kind: 'not-found' };
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      return { kind: 'corrupt', error: message };
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return { kind: 'corrupt', error: `JSONの解析に失敗: ${message}` };
    }

    const parsed = storedCollectionSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join('.') : '';
      return { kind: 'corrupt', error: `不正な記事データ: ${where} ${issue?.message ?? ''}`.trim() };
    }

    // 同じURLが複数あれば最初の1件のみ残す
    const seen = new Set<string>();
    const articles: Article[] = [];
    for (const article of parsed.data) {
      if (seen.has(article.url)) continue;
      seen.add(article.url);
      articles.push(article);
    }
    if (articles.length < parsed.data.length) {
      this.logger.warn(
        { category, removed: parsed.data.length - articles.length },
        'カテゴリファイル内の重複URLを除去しました'
      );
    }

    this.logger.debug({ category, count: articles.length }, 'カテゴリファイルを読み込み');
    return { kind: 'loaded', articles };
  }

  async save(category: string, articles: readonly Article[]): Promise<void> {
    const filePath = this.filePath(category);
    try {
      await writeJsonAtomic(filePath, articles);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new StorageWriteError(category, `カテゴリファイルの保存に失敗: ${message}`, { cause: error });
    }
    this.logger.debug({ category, path: filePath, count: articles.length }, 'カテゴリファイルを保存');
  }

  // 破損したファイルを退避する
  async quarantine(category: string, now: Date = new Date()): Promise<string> {
    const filePath = this.filePath(category);
    const stamp = now.toISOString().replace(/[:.]/g, '-');
    const backupPath = `${filePath}.corrupt-${stamp}`;
    await fs.rename(filePath, backupPath);
    this.logger.warn({ category, backupPath }, '破損したカテゴリファイルを退避しました');
    return backupPath;
  }

  // 保存済みのカテゴリ名一覧（名前順）
  async listCategories(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dataDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return files
      .filter((file) => file.endsWith('.json') && !file.startsWith('.'))
      .map((file) => file.slice(0, -'.json'.length))
      .sort();
  }

  // 書き込み可能なディレクトリを用意する
  async ensureWritable(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.access(this.dataDir, fs.constants.W_OK);
  }
}
