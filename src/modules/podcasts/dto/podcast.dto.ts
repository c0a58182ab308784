import { IsEnum, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Max, MaxLength, Min } from 'class-validator';
import { Type } from 'class-transformer';
import {
  AudioFormat,
  Clip,
  KeyPoint,
  PipelineStage,
  PodcastStatus,
} from '../../../database/entities';
import { PaginatedResponse } from '../../../common/interfaces/response.interface';
import { TranscriptFormat } from '../transcript-export';

export class CreatePodcastDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  // POST /upload-url 返回的 key
  @IsString()
  @Matches(/^uploads\/[\w-]+\/[\w.-]+$/, { message: 'audio_key must be an uploaded object key' })
  audio_key!: string;

  // 未提供时按 audio_key 扩展名推断
  @IsString()
  @IsOptional()
  content_type?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  size_bytes?: number;
}

export class GetPodcastsQueryDto {
  @IsEnum(PodcastStatus)
  @IsOptional()
  status?: PodcastStatus;

  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number = 20;

  @IsString()
  @IsOptional()
  cursor?: string;
}

export class GetTranscriptQueryDto {
  @IsIn(['json', 'srt', 'vtt'])
  @IsOptional()
  format?: TranscriptFormat = 'json';
}

export class CancelPodcastDto {
  @IsString()
  @MaxLength(200)
  @IsOptional()
  reason?: string;
}

export interface ClipResponseDto extends Omit<Clip, 'audio_key'> {
  download_url: string;
}

export interface PodcastResponseDto {
  podcast_id: string;
  title: string;
  status: PodcastStatus;
  audio_format: AudioFormat;
  duration_sec: number | null;
  attempt_count: number;
  error: { stage: PipelineStage | null; code: string; message: string } | null;
  created_at: string;
  updated_at: string;
}

export interface PodcastDetailResponseDto extends PodcastResponseDto {
  key_points: KeyPoint[];
  clips: ClipResponseDto[];
}

export type PodcastListResponseDto = PaginatedResponse<PodcastResponseDto>;

export type TranscriptResponseDto =
  | {
      format: 'json';
      duration_sec: number | null;
      segments: Array<{ start: number; end: number; text: string; speaker: string | null }>;
    }
  | { format: 'srt' | 'vtt'; content: string };

export interface ShareResponseDto {
  key_point_id: string;
  clip_url: string;
  share_url: string;
}
