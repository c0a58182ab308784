import { Injectable } from '@nestjs/common';
import { OpenAIService } from '../../../providers/openai/openai.service';
import { AudioFormat } from '../../../database/entities';
import { AUDIO_MIME_TYPES } from '../../../common/audio';
import { TranscriptionEngine, TranscriptResult } from '../transcription-engine';

@Injectable()
export class WhisperEngine extends TranscriptionEngine {
  readonly name = 'whisper';

  constructor(private openAIService: OpenAIService) {
    super();
  }

  async transcribe(
    audio: Buffer,
    format: AudioFormat,
    signal?: AbortSignal,
  ): Promise<TranscriptResult> {
    const result = await this.openAIService.transcribeAudio(
      audio,
      `podcast.${format}`,
      AUDIO_MIME_TYPES[format],
      signal,
    );

    return {
      duration: result.duration,
      segments: result.segments.map((seg) => ({
        start: seg.start,
        end: seg.end,
        text: seg.text.trim(),
        speaker: null, // Whisper 不区分说话人
      })),
    };
  }
}
