import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Post, Query } from '@nestjs/common';
import { PodcastsService } from './podcasts.service';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { CurrentUser as ICurrentUser } from '../../common/interfaces/response.interface';
import {
  CancelPodcastDto,
  ClipResponseDto,
  CreatePodcastDto,
  GetPodcastsQueryDto,
  GetTranscriptQueryDto,
  PodcastDetailResponseDto,
  PodcastListResponseDto,
  PodcastResponseDto,
  TranscriptResponseDto,
} from './dto/podcast.dto';

@Controller('podcasts')
export class PodcastsController {
  constructor(private readonly podcastsService: PodcastsService) {}

  /**
   * POST /api/podcasts
   * 创建播客并开始处理
   */
  @Post()
  async createPodcast(
    @Body() dto: CreatePodcastDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<PodcastResponseDto> {
    return this.podcastsService.createPodcast(dto, user);
  }

  /**
   * GET /api/podcasts
   */
  @Get()
  async getPodcasts(
    @Query() query: GetPodcastsQueryDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<PodcastListResponseDto> {
    return this.podcastsService.getPodcasts(query, user);
  }

  /**
   * GET /api/podcasts/:id
   */
  @Get(':id')
  async getPodcast(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: ICurrentUser,
  ): Promise<PodcastDetailResponseDto> {
    return this.podcastsService.getPodcast(id, user);
  }

  @Delete(':id')
  async deletePodcast(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: ICurrentUser,
  ): Promise<{ deleted: true }> {
    return this.podcastsService.deletePodcast(id, user);
  }

  /**
   * POST /api/podcasts/:id/retry
   * 重试失败的播客
   */
  @Post(':id/retry')
  async retryPodcast(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: ICurrentUser,
  ): Promise<PodcastResponseDto> {
    return this.podcastsService.retryPodcast(id, user);
  }

  @Post(':id/cancel')
  async cancelPodcast(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CancelPodcastDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<PodcastResponseDto> {
    return this.podcastsService.cancelPodcast(id, user, dto.reason);
  }

  /**
   * GET /api/podcasts/:id/transcript?format=json|srt|vtt
   */
  @Get(':id/transcript')
  async getTranscript(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: GetTranscriptQueryDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<TranscriptResponseDto> {
    return this.podcastsService.getTranscript(id, user, query.format ?? 'json');
  }

  @Get(':id/clips')
  async getClips(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: ICurrentUser,
  ): Promise<ClipResponseDto[]> {
    return this.podcastsService.getClips(id, user);
  }
}
