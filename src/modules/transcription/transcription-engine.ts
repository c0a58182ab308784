import { AudioFormat } from '../../database/entities';

// 时间单位为秒
export interface TimedSegment {
  start: number;
  end: number;
  text: string;
  speaker: string | null;
}

export interface TranscriptResult {
  duration: number;
  segments: TimedSegment[];
}

/**
 * 语音转文字引擎
 * 实现只负责一次外部调用，不做重试和持久化
 */
export abstract class TranscriptionEngine {
  abstract readonly name: string;

  abstract transcribe(
    audio: Buffer,
    format: AudioFormat,
    signal?: AbortSignal,
  ): Promise<TranscriptResult>;
}
