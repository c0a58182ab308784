import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { TranscriptionModule } from '../transcription/transcription.module';
import { KeyPointsModule } from '../key-points/key-points.module';
import { ClipsModule } from '../clips/clips.module';
import { PodcastRepository } from '../podcasts/repositories/podcast.repository';
import { SupabasePodcastRepository } from '../podcasts/repositories/supabase-podcast.repository';
import { PipelineService } from './pipeline.service';
import { PipelineQueueService } from './pipeline-queue.service';
import { PipelineProcessor } from './pipeline.processor';
import { PipelineCleanupService } from './pipeline-cleanup.service';
import { PIPELINE_QUEUE } from './constants';

const redisEnabled = process.env.REDIS_ENABLED === 'true';

@Module({
  imports: [
    ...(redisEnabled ? [BullModule.registerQueue({ name: PIPELINE_QUEUE })] : []),
    TranscriptionModule,
    KeyPointsModule,
    ClipsModule,
  ],
  providers: [
    { provide: PodcastRepository, useClass: SupabasePodcastRepository },
    PipelineService,
    PipelineQueueService,
    PipelineCleanupService,
    ...(redisEnabled ? [PipelineProcessor] : []),
  ],
  exports: [PodcastRepository, PipelineService, PipelineQueueService],
})
export class PipelineModule {}
