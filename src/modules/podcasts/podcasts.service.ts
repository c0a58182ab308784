import {
  Injectable,
  Logger,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Clip, Podcast, PodcastStatus } from '../../database/entities';
import { CurrentUser } from '../../common/interfaces/response.interface';
import { resolveAudioFormat } from '../../common/audio';
import { errorMessage } from '../../common/errors/pipeline.errors';
import { ObjectStorage } from '../../providers/r2/object-storage';
import { PipelineService } from '../pipeline/pipeline.service';
import { PipelineQueueService } from '../pipeline/pipeline-queue.service';
import { isTerminal } from '../pipeline/podcast-status';
import { uploadPrefix } from '../upload/upload.service';
import { PodcastRepository } from './repositories/podcast.repository';
import { TranscriptFormat, generateSRT, generateVTT } from './transcript-export';
import {
  ClipResponseDto,
  CreatePodcastDto,
  GetPodcastsQueryDto,
  PodcastDetailResponseDto,
  PodcastListResponseDto,
  PodcastResponseDto,
  ShareResponseDto,
  TranscriptResponseDto,
} from './dto/podcast.dto';

const DOWNLOAD_URL_TTL_SEC = 3600;
const SHARE_URL_TTL_SEC = 7 * 24 * 3600;

@Injectable()
export class PodcastsService {
  private readonly logger = new Logger(PodcastsService.name);

  constructor(
    private podcastRepository: PodcastRepository,
    private pipelineService: PipelineService,
    private pipelineQueue: PipelineQueueService,
    private storage: ObjectStorage,
  ) {}

  /**
   * 创建播客并投递处理
   */
  async createPodcast(dto: CreatePodcastDto, user: CurrentUser): Promise<PodcastResponseDto> {
    if (!dto.audio_key.startsWith(`${uploadPrefix(user.id)}/`)) {
      throw new ForbiddenException({
        code: 'FORBIDDEN',
        message: '无权使用该音频文件',
      });
    }

    // 格式不支持时抛 UnsupportedFormatError，不落库
    const format = resolveAudioFormat(dto.content_type ?? dto.audio_key.split('.').pop() ?? '');

    const podcast = await this.podcastRepository.create({
      id: uuidv4(),
      owner_id: user.id,
      title: dto.title,
      audio_key: dto.audio_key,
      audio_format: format,
      size_bytes: dto.size_bytes ?? null,
      attempt_id: uuidv4(),
    });
    this.logger.log(`Podcast ${podcast.id} created by user ${user.id}`);

    await this.pipelineQueue.enqueue(podcast.id, podcast.attempt_id);
    return this.toResponse(podcast);
  }

  /**
   * 获取播客列表（按创建时间倒序，created_at 游标分页）
   */
  async getPodcasts(query: GetPodcastsQueryDto, user: CurrentUser): Promise<PodcastListResponseDto> {
    const limit = query.limit ?? 20;
    const rows = await this.podcastRepository.list({
      ownerId: user.id,
      status: query.status,
      cursor: query.cursor,
      limit: limit + 1,
    });

    const hasMore = rows.length > limit;
    const items = hasMore ? rows.slice(0, limit) : rows;
    return {
      items: items.map((podcast) => this.toResponse(podcast)),
      next_cursor: hasMore && items.length > 0 ? items[items.length - 1].created_at : null,
    };
  }

  /**
   * 获取播客详情（含关键点与切片）
   */
  async getPodcast(id: string, user: CurrentUser): Promise<PodcastDetailResponseDto> {
    const podcast = await this.getOwnedPodcast(id, user);
    const [keyPoints, clips] = await Promise.all([
      this.podcastRepository.getKeyPoints(id),
      this.podcastRepository.getClips(id),
    ]);

    return {
      ...this.toResponse(podcast),
      key_points: keyPoints,
      clips: await Promise.all(clips.map((clip) => this.toClipResponse(clip))),
    };
  }

  /**
   * 删除播客：先取消处理，再删除记录与对象
   */
  async deletePodcast(id: string, user: CurrentUser): Promise<{ deleted: true }> {
    const podcast = await this.getOwnedPodcast(id, user);

    if (!isTerminal(podcast.status)) {
      await this.pipelineQueue.discard(id, podcast.attempt_id);
      await this.pipelineService.cancel(id, 'podcast deleted');
    }

    const clips = await this.podcastRepository.getClips(id);
    await this.podcastRepository.delete(id);

    const keys = [podcast.audio_key, ...clips.map((clip) => clip.audio_key)];
    try {
      await this.storage.deleteFiles(keys);
    } catch (error) {
      this.logger.warn(`Failed to delete objects of podcast ${id}: ${errorMessage(error)}`);
    }

    this.logger.log(`Podcast ${id} deleted`);
    return { deleted: true };
  }

  /**
   * 重试失败的播客（新一轮处理）
   */
  async retryPodcast(id: string, user: CurrentUser): Promise<PodcastResponseDto> {
    const podcast = await this.getOwnedPodcast(id, user);
    if (podcast.status !== PodcastStatus.FAILED) {
      throw new ConflictException({
        code: 'CONFLICT',
        message: `只有失败的播客可以重试，当前状态: ${podcast.status}`,
      });
    }

    const restarted = await this.pipelineService.restart(id);
    await this.pipelineQueue.enqueue(id, restarted.attempt_id);
    return this.toResponse(restarted);
  }

  /**
   * 取消处理，播客进入 failed（CANCELLED）
   */
  async cancelPodcast(id: string, user: CurrentUser, reason?: string): Promise<PodcastResponseDto> {
    const podcast = await this.getOwnedPodcast(id, user);
    if (isTerminal(podcast.status)) {
      throw new ConflictException({
        code: 'CONFLICT',
        message: `播客已结束处理，当前状态: ${podcast.status}`,
      });
    }

    await this.pipelineQueue.discard(id, podcast.attempt_id);
    const cancelled = await this.pipelineService.cancel(id, reason ?? 'cancelled by user');
    return this.toResponse(cancelled);
  }

  /**
   * 导出转录文本
   */
  async getTranscript(
    id: string,
    user: CurrentUser,
    format: TranscriptFormat,
  ): Promise<TranscriptResponseDto> {
    const podcast = await this.getOwnedPodcast(id, user);
    const segments = await this.podcastRepository.getSegments(id);
    if (segments.length === 0) {
      throw new ConflictException({
        code: 'CONFLICT',
        message: '转录尚未完成',
      });
    }

    switch (format) {
      case 'srt':
        return { format, content: generateSRT(segments) };
      case 'vtt':
        return { format, content: generateVTT(segments) };
      case 'json':
        return {
          format,
          duration_sec: podcast.duration_sec,
          segments: segments.map((seg) => ({
            start: seg.start_sec,
            end: seg.end_sec,
            text: seg.text,
            speaker: seg.speaker,
          })),
        };
    }
  }

  /**
   * 获取播客的全部切片
   */
  async getClips(podcastId: string, user: CurrentUser): Promise<ClipResponseDto[]> {
    await this.getOwnedPodcast(podcastId, user);
    const clips = await this.podcastRepository.getClips(podcastId);
    return Promise.all(clips.map((clip) => this.toClipResponse(clip)));
  }

  /**
   * 获取单个切片（含下载链接）
   */
  async getClip(id: string, user: CurrentUser): Promise<ClipResponseDto> {
    const clip = await this.getOwnedClip(id, user);
    return this.toClipResponse(clip);
  }

  /**
   * 删除单个切片
   */
  async deleteClip(id: string, user: CurrentUser): Promise<{ deleted: true }> {
    const clip = await this.getOwnedClip(id, user);
    await this.podcastRepository.deleteClip(id);
    try {
      await this.storage.deleteFiles([clip.audio_key]);
    } catch (error) {
      this.logger.warn(`Failed to delete clip object ${clip.audio_key}: ${errorMessage(error)}`);
    }
    return { deleted: true };
  }

  /**
   * 生成关键点的分享链接（Facebook sharer，指向切片音频）
   */
  async shareKeyPoint(keyPointId: string, user: CurrentUser): Promise<ShareResponseDto> {
    const keyPoint = await this.podcastRepository.findKeyPoint(keyPointId);
    if (!keyPoint) {
      throw this.notFound('关键点不存在');
    }
    const podcast = await this.getOwnedPodcast(keyPoint.podcast_id, user);

    const clips = await this.podcastRepository.getClips(podcast.id);
    const clip = clips.find((c) => c.key_point_id === keyPoint.id);
    if (!clip) {
      throw new ConflictException({
        code: 'CONFLICT',
        message: '该关键点的切片尚未生成',
      });
    }

    const clipUrl = await this.storage.getPresignedDownloadUrl(clip.audio_key, SHARE_URL_TTL_SEC);
    const params = new URLSearchParams({
      u: clipUrl,
      quote: keyPoint.content,
      title: `Key Point from ${podcast.title}`,
    });

    return {
      key_point_id: keyPoint.id,
      clip_url: clipUrl,
      share_url: `https://www.facebook.com/sharer/sharer.php?${params.toString()}`,
    };
  }

  private async getOwnedPodcast(id: string, user: CurrentUser): Promise<Podcast> {
    const podcast = await this.podcastRepository.findById(id);
    if (!podcast) {
      throw this.notFound('播客不存在');
    }
    if (podcast.owner_id !== user.id) {
      throw new ForbiddenException({
        code: 'FORBIDDEN',
        message: '无权访问该播客',
      });
    }
    return podcast;
  }

  private async getOwnedClip(id: string, user: CurrentUser): Promise<Clip> {
    const clip = await this.podcastRepository.findClip(id);
    if (!clip) {
      throw this.notFound('切片不存在');
    }
    await this.getOwnedPodcast(clip.podcast_id, user);
    return clip;
  }

  private notFound(message: string): NotFoundException {
    return new NotFoundException({ code: 'NOT_FOUND', message });
  }

  private async toClipResponse(clip: Clip): Promise<ClipResponseDto> {
    const { audio_key, ...rest } = clip;
    return {
      ...rest,
      download_url: await this.storage.getPresignedDownloadUrl(audio_key, DOWNLOAD_URL_TTL_SEC),
    };
  }

  private toResponse(podcast: Podcast): PodcastResponseDto {
    return {
      podcast_id: podcast.id,
      title: podcast.title,
      status: podcast.status,
      audio_format: podcast.audio_format,
      duration_sec: podcast.duration_sec,
      attempt_count: podcast.attempt_count,
      error:
        podcast.status === PodcastStatus.FAILED
          ? {
              stage: podcast.failed_stage,
              code: podcast.error_code ?? 'INTERNAL_ERROR',
              message: podcast.error ?? '',
            }
          : null,
      created_at: podcast.created_at,
      updated_at: podcast.updated_at,
    };
  }
}
