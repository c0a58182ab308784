import { Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import { BoundedPool } from '../../common/utils/bounded-pool';
import { errorMessage } from '../../common/errors/pipeline.errors';
import { PipelineService } from './pipeline.service';
import { PIPELINE_QUEUE, PipelineJobData } from './constants';

/**
 * 每轮处理一个 job：重试后的新一轮不会被上一轮仍未结束的 job 吞掉
 */
export function pipelineJobId(podcastId: string, attemptId: string): string {
  return `${podcastId}-${attemptId}`;
}

/**
 * 流水线调度
 * 启用 Redis 时投递 BullMQ（jobId 为 播客 id + 轮次，同一轮天然去重），否则进程内有界并发池执行
 */
@Injectable()
export class PipelineQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(PipelineQueueService.name);
  private readonly pool: BoundedPool | null;
  // 进程内池中尚未结束的轮次
  private readonly scheduled = new Set<string>();

  constructor(
    private pipelineService: PipelineService,
    private configService: ConfigService,
    @Optional() @InjectQueue(PIPELINE_QUEUE) private pipelineQueue?: Queue<PipelineJobData>,
  ) {
    this.pool = this.pipelineQueue
      ? null
      : new BoundedPool(this.configService.get<number>('pipeline.concurrency') ?? 2);
  }

  /**
   * 投递一轮处理
   */
  async enqueue(podcastId: string, attemptId: string): Promise<void> {
    const data: PipelineJobData = { podcast_id: podcastId, attempt_id: attemptId };
    const jobId = pipelineJobId(podcastId, attemptId);

    if (this.pipelineQueue) {
      await this.pipelineQueue.add('process', data, {
        jobId,
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: true,
      });
      this.logger.log(`Podcast ${podcastId} queued (attempt ${attemptId})`);
      return;
    }

    if (this.pool) {
      if (this.scheduled.has(jobId)) return;
      if (!this.pool.submit(() => this.runScheduled(jobId, podcastId, attemptId))) {
        this.logger.warn(`Pool closed, podcast ${podcastId} stays pending`);
        return;
      }
      this.scheduled.add(jobId);
      this.logger.log(`Podcast ${podcastId} scheduled in-process (attempt ${attemptId})`);
    }
  }

  /**
   * 该轮是否已在队列中（等待或执行中）
   */
  async isQueued(podcastId: string, attemptId: string): Promise<boolean> {
    const jobId = pipelineJobId(podcastId, attemptId);
    if (this.pipelineQueue) {
      return (await this.pipelineQueue.getJob(jobId)) !== undefined;
    }
    return this.scheduled.has(jobId);
  }

  /**
   * 移除尚未开始的队列任务；已开始的由 PipelineService.cancel 处理
   */
  async discard(podcastId: string, attemptId: string): Promise<void> {
    if (!this.pipelineQueue) return;
    const jobId = pipelineJobId(podcastId, attemptId);
    const job = await this.pipelineQueue.getJob(jobId);
    if (!job) return;
    try {
      await job.remove();
      this.logger.log(`Removed queued job for podcast ${podcastId}`);
    } catch (error) {
      // 任务已被 worker 锁定
      this.logger.debug(`Job ${jobId} not removed: ${errorMessage(error)}`);
    }
  }

  /**
   * 等待进程内池中的任务全部完成
   */
  async onIdle(): Promise<void> {
    await this.pool?.onIdle();
  }

  /**
   * 关闭时丢弃尚未开始的任务（播客保持 pending，由清理任务重新投递），只等待执行中的
   */
  async onModuleDestroy(): Promise<void> {
    if (!this.pool) return;
    const dropped = this.pool.close();
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} queued pipelines on shutdown`);
    }
    await this.pool.onIdle();
    this.scheduled.clear();
  }

  private async runScheduled(jobId: string, podcastId: string, attemptId: string): Promise<void> {
    try {
      await this.pipelineService.run(podcastId, { attemptId });
    } finally {
      this.scheduled.delete(jobId);
    }
  }
}
