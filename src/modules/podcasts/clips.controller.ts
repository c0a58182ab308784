import { Controller, Delete, Get, Param, ParseUUIDPipe } from '@nestjs/common';
import { PodcastsService } from './podcasts.service';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { CurrentUser as ICurrentUser } from '../../common/interfaces/response.interface';
import { ClipResponseDto, ShareResponseDto } from './dto/podcast.dto';

@Controller()
export class ClipsController {
  constructor(private readonly podcastsService: PodcastsService) {}

  /**
   * GET /api/clips/:id
   * 获取切片及下载链接
   */
  @Get('clips/:id')
  async getClip(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: ICurrentUser,
  ): Promise<ClipResponseDto> {
    return this.podcastsService.getClip(id, user);
  }

  @Delete('clips/:id')
  async deleteClip(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: ICurrentUser,
  ): Promise<{ deleted: true }> {
    return this.podcastsService.deleteClip(id, user);
  }

  /**
   * GET /api/key-points/:id/share
   * 关键点分享链接
   */
  @Get('key-points/:id/share')
  async shareKeyPoint(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: ICurrentUser,
  ): Promise<ShareResponseDto> {
    return this.podcastsService.shareKeyPoint(id, user);
  }
}
