import type { Config } from '../config/index.js';
import type { Article, PageFetcher } from '../collectors/index.js';
import { WordPressPageFetcher } from '../collectors/index.js';
import { CategoryStore, StorageWriteError } from '../storage/category-store.js';
import { harvestCategory, type StopReason } from './harvester.js';
import { getLogger } from '../utils/logger.js';

export type HarvestPipelineConfig = Pick<Config, 'api' | 'categories' | 'storage'>;

export interface HarvestPipelineDeps {
  fetcher?: PageFetcher;
  store?: CategoryStore;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export type CategoryStatus = 'harvested' | 'skipped' | 'failed';

export interface CategoryRunSummary {
  category: string;
  status: CategoryStatus;
  added: number;
  total: number;
  pagesFetched: number;
  invalidPosts: number;
  stopReason?: StopReason;
  error?: string;
}

export interface PipelineResult {
  added: number;
  total: number;
  categories: CategoryRunSummary[];
  failed: string[];
}

export interface PipelineRunOptions {
  // 指定した場合はカタログのうちこのカテゴリのみ収集
  categories?: string[];
}

export class HarvestPipeline {
  private config: HarvestPipelineConfig;
  private fetcher: PageFetcher;
  private store: CategoryStore;
  private deps: HarvestPipelineDeps;
  private running = false;
  private logger = getLogger();

  constructor(config: HarvestPipelineConfig, deps: HarvestPipelineDeps = {}) {
    this.config = config;
    this.deps = deps;
    this.fetcher = deps.fetcher ?? new WordPressPageFetcher(config.api);
    this.store = deps.store ?? new CategoryStore(config.storage.dataDir);
  }

  // 保存先ディレクトリを用意する（書き込めない場合は例外）
  async initialize(): Promise<void> {
    await this.store.ensureWritable();
    this.logger.info(
      { dataDir: this.store.dataDir, categories: Object.keys(this.config.categories).length },
      'パイプラインを初期化しました'
    );
  }

  isRunning(): boolean {
    return this.running;
  }

  async run(options: PipelineRunOptions = {}): Promise<PipelineResult> {
    this.running = true;
    try {
      return await this.runAll(options);
    } finally {
      this.running = false;
    }
  }

  private selectCategories(requested?: string[]): [string, number][] {
    const catalog = Object.entries(this.config.categories);
    if (!requested || requested.length === 0) {
      return catalog;
    }

    for (const name of requested) {
      if (!(name in this.config.categories)) {
        this.logger.warn({ category: name }, 'カタログに存在しないカテゴリを無視します');
      }
    }
    return catalog.filter(([name]) => requested.includes(name));
  }

  private async runAll(options: PipelineRunOptions): Promise<PipelineResult> {
    const targets = this.selectCategories(options.categories);
    this.logger.info({ count: targets.length, dataDir: this.store.dataDir }, '収集を開始');

    const summaries: CategoryRunSummary[] = [];
    for (const [category, categoryId] of targets) {
      summaries.push(await this.runCategory(category, categoryId));
    }

    const result: PipelineResult = {
      added: summaries.reduce((sum, s) => sum + s.added, 0),
      total: summaries.reduce((sum, s) => sum + s.total, 0),
      categories: summaries,
      failed: summaries.filter((s) => s.status === 'failed').map((s) => s.category),
    };

    this.logger.info(
      {
        added: result.added,
        total: result.total,
        failed: result.failed.length,
        skipped: summaries.filter((s) => s.status === 'skipped').length,
      },
      '収集が完了しました'
    );
    return result;
  }

  private async loadExisting(category: string): Promise<Article[] | null> {
    const loaded = await this.store.load(category);

    switch (loaded.kind) {
      case 'loaded':
        return loaded.articles;
      case 'not-found':
        return [];
      case 'corrupt':
        if (this.config.storage.onCorrupt === 'reset') {
          this.logger.warn({ category, error: loaded.error }, 'カテゴリファイルが破損しているため空から収集します');
          await this.store.quarantine(category, this.deps.now?.());
          return [];
        }
        this.logger.error(
          { category, error: loaded.error, path: this.store.filePath(category) },
          'カテゴリファイルが破損しているため収集をスキップします'
        );
        return null;
    }
  }

  private async runCategory(category: string, categoryId: number): Promise<CategoryRunSummary> {
    try {
      const existing = await this.loadExisting(category);
      if (existing === null) {
        return { category, status: 'skipped', added: 0, total: 0, pagesFetched: 0, invalidPosts: 0, error: 'corrupt store file' };
      }
      this.logger.info({ category, count: existing.length }, '既存記事を読み込みました');

      const harvested = await harvestCategory(category, categoryId, existing, {
        fetcher: this.fetcher,
        delayMs: this.config.api.delayMs,
        maxPages: this.config.api.maxPages,
        sleep: this.deps.sleep,
        now: this.deps.now,
        logger: this.logger,
      });

      await this.store.save(category, harvested.articles);
      this.logger.info(
        {
          category,
          added: harvested.newCount,
          invalid: harvested.invalidPosts,
          total: harvested.articles.length,
          path: this.store.filePath(category),
        },
        'カテゴリを保存しました'
      );

      return {
        category,
        status: 'harvested',
        added: harvested.newCount,
        total: harvested.articles.length,
        pagesFetched: harvested.pagesFetched,
        invalidPosts: harvested.invalidPosts,
        stopReason: harvested.stopReason,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      if (error instanceof StorageWriteError) {
        this.logger.error({ category, error: message }, '保存に失敗したため既存ファイルを保持します');
      } else {
        this.logger.error({ category, error: message }, 'カテゴリの収集中にエラーが発生しました');
      }
      return { category, status: 'failed', added: 0, total: 0, pagesFetched: 0, invalidPosts: 0, error: message };
    }
  }
}
