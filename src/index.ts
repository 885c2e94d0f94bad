import 'dotenv/config';
import path from 'path';
import { loadConfig, type Config } from './config/index.js';
import { HarvestPipeline } from './pipeline/index.js';
import { Scheduler } from './pipeline/scheduler.js';
import { CategoryStore } from './storage/category-store.js';
import { consolidate } from './corpus/consolidate.js';
import {
  exportResults,
  filterByDateRange,
  getStatistics,
  loadCorpus,
  searchArticles,
  type CorpusMatch,
} from './corpus/query.js';
import { createLogger, getLogger } from './utils/logger.js';
import { formatPercent, toSingleLine, truncateText } from './utils/text.js';

type Command = 'harvest' | 'consolidate' | 'query';

// --key=value 形式の引数を取得
function option(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

function parseCommand(args: string[]): Command {
  const positional = args.find((a) => !a.startsWith('--')) ?? 'harvest';
  if (positional === 'harvest' || positional === 'consolidate' || positional === 'query') {
    return positional;
  }
  throw new Error(`不明なコマンドです: ${positional}（harvest / consolidate / query）`);
}

function parseDate(value: string | undefined, name: string): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`--${name} の日付が不正です: ${value}`);
  }
  return date;
}

async function runHarvest(config: Config, args: string[]): Promise<void> {
  const logger = getLogger();
  const modeOverride = option(args, 'mode');
  if (modeOverride !== undefined && modeOverride !== 'once' && modeOverride !== 'batch') {
    throw new Error(`不正なモードです: ${modeOverride}`);
  }
  const mode = modeOverride ?? config.mode;
  const categories = option(args, 'categories')
    ?.split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);

  // 保存先を用意できなければ起動失敗
  const pipeline = new HarvestPipeline(config);
  await pipeline.initialize();

  if (mode === 'once') {
    logger.info('1回実行モードで起動');
    const result = await pipeline.run({ categories });
    if (result.failed.length > 0) {
      logger.warn({ failed: result.failed }, '一部のカテゴリで失敗しました');
    }
    return;
  }

  // 定期実行モード
  logger.info({ cron: config.schedule.cron }, 'バッチモードで起動');
  const scheduler = new Scheduler(pipeline, {
    cron: config.schedule.cron,
    timezone: config.schedule.timezone,
  });
  scheduler.start();

  // シグナルハンドリング
  const shutdown = () => {
    logger.info('シャットダウンを開始します');
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // 起動時に1回実行するオプション
  if (args.includes('--run-now')) {
    logger.info('起動時に即座に実行します');
    await scheduler.tick();
  }
}

async function runConsolidate(config: Config, args: string[]): Promise<void> {
  const policy = option(args, 'policy') ?? config.consolidate.categoryPolicy;
  if (policy !== 'first' && policy !== 'union') {
    throw new Error(`不正なポリシーです: ${policy}`);
  }
  const store = new CategoryStore(option(args, 'data-dir') ?? config.storage.dataDir);
  const output = path.resolve(option(args, 'output') ?? config.consolidate.output);
  await consolidate(store, output, policy);
}

function printMatches(matches: CorpusMatch[], limit: number): void {
  const logger = getLogger();
  logger.info({ count: matches.length }, '該当する記事');

  matches.slice(0, limit).forEach(({ category, article }, index) => {
    logger.info(
      {
        url: article.url,
        scrapedAt: article.scraped_at,
        preview: truncateText(toSingleLine(article.text), 150),
      },
      `${index + 1}. [${category}] ${article.title || '(タイトルなし)'}`
    );
  });

  if (matches.length > limit) {
    logger.info(`... ほか ${matches.length - limit} 件`);
  }
}

async function runQuery(config: Config, args: string[]): Promise<void> {
  const logger = getLogger();
  const store = new CategoryStore(option(args, 'data-dir') ?? config.storage.dataDir);
  const corpus = await loadCorpus(store);
  if (corpus.size === 0) {
    throw new Error(`カテゴリファイルが見つかりません: ${store.dataDir}`);
  }

  const search = option(args, 'search');
  const from = parseDate(option(args, 'from'), 'from');
  const to = parseDate(option(args, 'to'), 'to');
  const limit = Number.parseInt(option(args, 'limit') ?? '10', 10);

  if (!args.includes('--stats') && (search !== undefined || from || to)) {
    const category = option(args, 'category');
    let matches = search !== undefined ? searchArticles(corpus, search, category) : filterByDateRange(corpus, from, to);
    if (search !== undefined && (from || to)) {
      const inRange = new Set(filterByDateRange(corpus, from, to).map((m) => m.article));
      matches = matches.filter((m) => inRange.has(m.article));
    }
    if (search === undefined && category) {
      matches = matches.filter((m) => m.category === category);
    }

    printMatches(matches, Number.isNaN(limit) || limit <= 0 ? 10 : limit);

    const exportPath = option(args, 'export');
    if (exportPath) {
      await exportResults(matches, path.resolve(exportPath));
    }
    return;
  }

  // 統計情報（デフォルト）
  const stats = getStatistics(corpus);
  logger.info(
    {
      totalArticles: stats.totalArticles,
      totalCategories: stats.totalCategories,
      earliest: stats.dateRange.earliest,
      latest: stats.dateRange.latest,
    },
    '統計情報'
  );
  const sorted = Object.entries(stats.categories).sort((a, b) => b[1] - a[1]);
  for (const [category, count] of sorted) {
    logger.info(`${category.padEnd(25)}: ${String(count).padStart(6)} (${formatPercent(count, stats.totalArticles)})`);
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = parseCommand(args);

  // 設定を読み込み
  const config = loadConfig(option(args, 'config'));

  // ロガーを初期化
  createLogger(config.logging.level);
  getLogger().debug({ command }, 'コマンドを実行します');

  switch (command) {
    case 'harvest':
      await runHarvest(config, args);
      break;
    case 'consolidate':
      await runConsolidate(config, args);
      break;
    case 'query':
      await runQuery(config, args);
      break;
  }
}

main().catch((error) => {
  console.error('起動エラー:', error);
  process.exit(1);
});
