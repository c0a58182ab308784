import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AudioFormat } from '../../database/entities';
import { isAudioFormat, openAudio, resolveAudioFormat } from '../../common/audio';
import {
  InvalidRangeError,
  TranscodeFailedError,
  errorMessage,
} from '../../common/errors/pipeline.errors';
import { throwIfCancelled } from '../../common/utils/async';
import { FfmpegTranscoder } from './ffmpeg-transcoder';

export interface ClipRange {
  start: number;
  end: number;
}

export interface SlicedClip {
  start: number;
  end: number;
  duration: number;
  format: AudioFormat;
  data: Buffer;
}

export interface SliceOptions {
  /** 目标编码；为空时保持源编码 */
  reencode?: AudioFormat | null;
  signal?: AbortSignal;
}

// 引擎给出的时长与实际音频时长的舍入误差（秒）
export const DURATION_TOLERANCE_SEC = 0.05;

@Injectable()
export class ClipSlicerService {
  private readonly logger = new Logger(ClipSlicerService.name);
  private readonly defaultReencode: AudioFormat | null;
  private readonly transcoder: FfmpegTranscoder;

  constructor(private configService: ConfigService) {
    const reencode = this.configService.get<string | null>('clips.reencodeFormat');
    this.defaultReencode = reencode && isAudioFormat(reencode) ? reencode : null;
    this.transcoder = new FfmpegTranscoder(
      this.configService.get<string>('clips.ffmpegPath') || 'ffmpeg',
    );
  }

  /**
   * 按时间范围切割音频
   * 返回顺序与 ranges 一致；源 buffer 不会被修改
   */
  async slice(
    audio: Buffer,
    declaredFormat: AudioFormat | string,
    ranges: ClipRange[],
    options: SliceOptions = {},
  ): Promise<SlicedClip[]> {
    const format = resolveAudioFormat(declaredFormat);
    const source = openAudio(audio, format);
    const target = options.reencode === undefined ? this.defaultReencode : options.reencode;

    // 先整体校验，避免部分切割
    const windows = ranges.map((range) => this.validateRange(range, source.duration));

    const clips = await Promise.all(
      windows.map(async ({ start, end }) => {
        let data = source.cut(start, end);
        let outFormat = format;
        if (target && target !== format) {
          data = await this.transcode(data, format, target, options.signal);
          outFormat = target;
        }
        return {
          start,
          end,
          duration: Math.round((end - start) * 1000) / 1000,
          format: outFormat,
          data,
        };
      }),
    );

    this.logger.log(`Sliced ${clips.length} clips from ${source.duration.toFixed(2)}s of ${format}`);
    return clips;
  }

  private async transcode(
    data: Buffer,
    from: AudioFormat,
    to: AudioFormat,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    throwIfCancelled(signal);
    try {
      return await this.transcoder.transcode(data, from, to, signal);
    } catch (error) {
      // 取消导致的进程中止按取消上报
      throwIfCancelled(signal);
      throw new TranscodeFailedError(`Transcode ${from} -> ${to} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private validateRange(range: ClipRange, duration: number): ClipRange {
    const { start, end } = range;
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
      throw new InvalidRangeError(start, end, 'bounds must be finite numbers');
    }
    if (start < 0) {
      throw new InvalidRangeError(start, end, 'start is negative');
    }
    if (start >= end) {
      throw new InvalidRangeError(start, end, 'start must be before end');
    }
    if (end > duration + DURATION_TOLERANCE_SEC) {
      throw new InvalidRangeError(start, end, `end exceeds audio duration (${duration}s)`);
    }
    const clampedEnd = Math.min(end, duration);
    if (start >= clampedEnd) {
      throw new InvalidRangeError(start, end, `start is at or beyond audio duration (${duration}s)`);
    }
    return { start, end: clampedEnd };
  }
}
