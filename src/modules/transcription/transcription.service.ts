import { Injectable, Logger } from '@nestjs/common';
import { AudioFormat } from '../../database/entities';
import { resolveAudioFormat } from '../../common/audio';
import {
  PipelineError,
  TranscriptionFailedError,
  errorMessage,
  isTransientError,
} from '../../common/errors/pipeline.errors';
import { TranscriptionEngine, TranscriptResult } from './transcription-engine';
import { normalizeSegments } from './segment-normalizer';

export interface TranscribeOptions {
  signal?: AbortSignal;
}

@Injectable()
export class TranscriptionService {
  private readonly logger = new Logger(TranscriptionService.name);

  constructor(private engine: TranscriptionEngine) {}

  /**
   * 转录音频：校验格式 → 一次引擎调用 → 规范化片段
   * 格式不支持时抛 UnsupportedFormatError（不发起外部调用），引擎错误包装为 TranscriptionFailedError
   */
  async transcribe(
    audio: Buffer,
    declaredFormat: AudioFormat | string,
    options: TranscribeOptions = {},
  ): Promise<TranscriptResult> {
    const format = resolveAudioFormat(declaredFormat);
    this.logger.log(`Transcribing ${audio.length} bytes of ${format} with ${this.engine.name}`);

    let raw: TranscriptResult;
    try {
      raw = await this.engine.transcribe(audio, format, options.signal);
    } catch (error) {
      // 超时与取消由调用方处理
      if (error instanceof PipelineError) throw error;
      throw new TranscriptionFailedError(
        `${this.engine.name} transcription failed: ${errorMessage(error)}`,
        { transient: isTransientError(error), cause: error },
      );
    }

    const result = normalizeSegments(raw);
    if (result.segments.length === 0 || result.duration <= 0) {
      throw new TranscriptionFailedError(`${this.engine.name} returned no speech`);
    }

    this.logger.log(
      `Transcription done: ${result.segments.length} segments, duration: ${result.duration}s`,
    );
    return result;
  }

  /**
   * 拼接全文（关键点提取的输入）
   */
  static joinText(segments: Array<{ text: string }>): string {
    return segments.map((seg) => seg.text).join('\n');
  }
}
