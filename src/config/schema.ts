import { z } from 'zod';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

// 取得元API設定
const apiSchema = z.object({
  baseUrl: z.string().url().default('https://www.slobodenpecat.mk/wp-json/wp/v2/posts'),
  pageSize: z.number().int().positive().max(100).default(20),
  delayMs: z.number().int().nonnegative().default(200),
  timeoutMs: z.number().int().positive().default(30000),
  // 暴走防止のためのページ数上限
  maxPages: z.number().int().positive().default(9999),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
});

// カテゴリカタログ（カテゴリ名 -> リモートのカテゴリID）
const categoriesSchema = z.record(
  z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, 'カテゴリ名はファイル名として使える文字のみ'),
  z.number().int().positive()
);

// 保存設定
const storageSchema = z.object({
  dataDir: z.string().default('./data'),
  onCorrupt: z.enum(['skip', 'reset']).default('skip'),
});

// 統合設定
const consolidateSchema = z.object({
  output: z.string().default('./consolidated_data.json'),
  categoryPolicy: z.enum(['first', 'union']).default('union'),
});

// スケジュール設定
const scheduleSchema = z.object({
  cron: z.string().default('0 6 * * *'),
  timezone: z.string().default('Europe/Skopje'),
});

// ログ設定
const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

// メイン設定スキーマ
export const configSchema = z.object({
  mode: z.enum(['once', 'batch']).default('once'),
  api: apiSchema.default({}),
  categories: categoriesSchema.default({}),
  storage: storageSchema.default({}),
  consolidate: consolidateSchema.default({}),
  schedule: scheduleSchema.default({}),
  logging: loggingSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ApiConfig = Config['api'];
export type CategoryMergePolicy = Config['consolidate']['categoryPolicy'];
