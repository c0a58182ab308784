import { Processor, WorkerHost, OnWorkerEvent } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import configuration from '../../common/config/configuration';
import { PodcastStatus } from '../../database/entities';
import { PipelineService } from './pipeline.service';
import { PIPELINE_QUEUE, PipelineJobData } from './constants';

const { concurrency, rateLimitMax, rateLimitDurationMs } = configuration().pipeline;

@Processor(PIPELINE_QUEUE, {
  concurrency,
  limiter: { max: rateLimitMax, duration: rateLimitDurationMs },
})
export class PipelineProcessor extends WorkerHost {
  private readonly logger = new Logger(PipelineProcessor.name);

  constructor(private pipelineService: PipelineService) {
    super();
  }

  async process(job: Job<PipelineJobData>): Promise<void> {
    const podcast = await this.pipelineService.run(job.data.podcast_id, {
      attemptId: job.data.attempt_id,
    });
    if (podcast.status === PodcastStatus.FAILED && podcast.attempt_id === job.data.attempt_id) {
      throw new Error(podcast.error ?? 'pipeline failed');
    }
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<PipelineJobData>, error: Error) {
    this.logger.error(`Job ${job.id} failed: ${error.message}`);
  }
}
