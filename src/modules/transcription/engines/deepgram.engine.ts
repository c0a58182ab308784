import { Injectable, Logger } from '@nestjs/common';
import {
  DeepgramResult,
  DeepgramService,
} from '../../../providers/deepgram/deepgram.service';
import { AudioFormat } from '../../../database/entities';
import { AUDIO_MIME_TYPES } from '../../../common/audio';
import { TimedSegment, TranscriptionEngine, TranscriptResult } from '../transcription-engine';

// 词间隔超过该值（秒）时切分新片段
const TIME_GAP_THRESHOLD = 1.0;

const speakerLabel = (speaker: number | null | undefined): string | null =>
  speaker !== undefined && speaker !== null ? `Speaker ${speaker}` : null;

/**
 * 从 Deepgram 结果提取片段
 * 优先使用 utterances（按语义分段），fallback 到 words
 */
export function extractDeepgramSegments(result: DeepgramResult): TimedSegment[] {
  if (result.utterances.length > 0) {
    return result.utterances.map((utterance) => ({
      start: utterance.start,
      end: utterance.end,
      text: utterance.transcript,
      speaker: speakerLabel(utterance.speaker),
    }));
  }

  // Fallback: 按 speaker 变化或时间间隔分段
  const words = result.channels[0]?.alternatives[0]?.words || [];
  const segments: TimedSegment[] = [];
  let current: { start: number; end: number; text: string; speaker: number | null } | null =
    null;

  for (const word of words) {
    const speaker = word.speaker ?? null;
    const wordText = word.punctuated_word || word.word;

    if (
      !current ||
      current.speaker !== speaker ||
      word.start - current.end > TIME_GAP_THRESHOLD
    ) {
      if (current) {
        segments.push({ ...current, speaker: speakerLabel(current.speaker) });
      }
      current = { start: word.start, end: word.end, text: wordText, speaker };
    } else {
      current.end = word.end;
      current.text += ' ' + wordText;
    }
  }

  if (current) {
    segments.push({ ...current, speaker: speakerLabel(current.speaker) });
  }

  return segments;
}

@Injectable()
export class DeepgramEngine extends TranscriptionEngine {
  readonly name = 'deepgram';
  private readonly logger = new Logger(DeepgramEngine.name);

  constructor(private deepgramService: DeepgramService) {
    super();
  }

  async transcribe(
    audio: Buffer,
    format: AudioFormat,
    signal?: AbortSignal,
  ): Promise<TranscriptResult> {
    const result = await this.deepgramService.transcribeBuffer(
      audio,
      AUDIO_MIME_TYPES[format],
      { diarize: true, detect_language: true },
      signal,
    );

    const segments = extractDeepgramSegments(result);
    this.logger.log(`Extracted ${segments.length} segments from Deepgram result`);
    return { duration: result.duration, segments };
  }
}
