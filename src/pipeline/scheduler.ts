import cron from 'node-cron';
import type { HarvestPipeline } from './index.js';
import { getLogger } from '../utils/logger.js';

export interface SchedulerConfig {
  cron: string;
  timezone: string;
}

export class Scheduler {
  private pipeline: HarvestPipeline;
  private config: SchedulerConfig;
  private task: cron.ScheduledTask | null = null;
  private logger = getLogger();

  constructor(pipeline: HarvestPipeline, config: SchedulerConfig) {
    this.pipeline = pipeline;
    this.config = config;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('スケジューラーは既に開始されています');
      return;
    }

    // cron式のバリデーション
    if (!cron.validate(this.config.cron)) {
      throw new Error(`無効なcron式です: ${this.config.cron}`);
    }

    this.task = cron.schedule(
      this.config.cron,
      () => {
        void this.tick();
      },
      {
        timezone: this.config.timezone,
        scheduled: true,
      }
    );

    this.logger.info(
      { cron: this.config.cron, timezone: this.config.timezone },
      'スケジューラーを開始しました'
    );
  }

  // 1回分のスケジュール実行（前回の収集が続いていればスキップ）
  async tick(): Promise<void> {
    if (this.pipeline.isRunning()) {
      this.logger.warn('前回の収集が実行中のため今回の実行をスキップします');
      return;
    }

    this.logger.info({ cron: this.config.cron }, 'スケジュールされた収集を開始');
    try {
      const result = await this.pipeline.run();
      this.logger.info(
        { added: result.added, total: result.total, failed: result.failed },
        'スケジュール実行が完了しました'
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ error: message }, 'スケジュール実行が失敗しました');
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.info('スケジューラーを停止しました');
    }
  }
}
