import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';
import { PodcastsController } from './podcasts.controller';
import { ClipsController } from './clips.controller';
import { PodcastsService } from './podcasts.service';

@Module({
  imports: [PipelineModule],
  controllers: [PodcastsController, ClipsController],
  providers: [PodcastsService],
})
export class PodcastsModule {}
