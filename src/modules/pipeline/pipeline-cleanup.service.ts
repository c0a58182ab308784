import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { PipelineErrorCode, errorMessage } from '../../common/errors/pipeline.errors';
import { PodcastRepository } from '../podcasts/repositories/podcast.repository';
import { PodcastStatus } from '../../database/entities';
import { PipelineService } from './pipeline.service';
import { PipelineQueueService } from './pipeline-queue.service';
import { stageOf } from './podcast-status';

export interface CleanupResult {
  failed: number;
  requeued: number;
}

/**
 * 卡住的流水线清理
 * 超过 staleAfterMinutes 没有推进的进行中播客标记为失败（worker 崩溃后留下的中间状态）；
 * 没有对应队列任务的 pending 播客重新投递（进程重启丢掉的进程内任务、被旧任务吞掉的重试）
 */
@Injectable()
export class PipelineCleanupService implements OnModuleInit {
  private readonly logger = new Logger(PipelineCleanupService.name);
  private readonly staleAfterMinutes: number;

  constructor(
    private podcastRepository: PodcastRepository,
    private pipelineService: PipelineService,
    private pipelineQueue: PipelineQueueService,
    private configService: ConfigService,
  ) {
    this.staleAfterMinutes = this.configService.get<number>('pipeline.staleAfterMinutes') ?? 30;
  }

  async onModuleInit() {
    this.logger.log('Running initial stale pipeline cleanup...');
    await this.handleCron();
  }

  @Cron(CronExpression.EVERY_5_MINUTES)
  async handleCron() {
    try {
      await this.cleanupStalePodcasts();
    } catch (error) {
      this.logger.error(`Stale pipeline cleanup failed: ${errorMessage(error)}`);
    }
  }

  /**
   * 本进程仍在执行的跳过
   */
  async cleanupStalePodcasts(now = new Date()): Promise<CleanupResult> {
    const threshold = new Date(now.getTime() - this.staleAfterMinutes * 60 * 1000);
    const stale = await this.podcastRepository.findStale(threshold);

    if (stale.length === 0) {
      this.logger.debug('No stale podcasts found');
      return { failed: 0, requeued: 0 };
    }

    let marked = 0;
    let requeued = 0;
    for (const podcast of stale) {
      if (this.pipelineService.isRunning(podcast.id)) continue;

      if (podcast.status === PodcastStatus.PENDING) {
        if (await this.pipelineQueue.isQueued(podcast.id, podcast.attempt_id)) continue;
        await this.pipelineQueue.enqueue(podcast.id, podcast.attempt_id);
        requeued++;
        continue;
      }

      const stage = stageOf(podcast.status);
      const code = PipelineErrorCode.STAGE_TIMEOUT;
      const failed = await this.podcastRepository.markFailed(podcast.id, podcast.attempt_id, {
        stage,
        code,
        message: this.pipelineService.describe(
          stage,
          code,
          `no progress for ${this.staleAfterMinutes} minutes`,
        ),
      });
      if (failed) marked++;
    }

    this.logger.log(`Marked ${marked} stale podcasts as failed, requeued ${requeued} pending`);
    return { failed: marked, requeued };
  }
}
