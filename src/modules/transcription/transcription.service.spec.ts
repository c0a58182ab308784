import { TranscriptionService } from './transcription.service';
import { ScriptedTranscriptionEngine } from '../../testing/scripted-transcription-engine';
import { AudioFormat } from '../../database/entities';
import {
  PipelineErrorCode,
  ProviderHttpError,
  StageTimeoutError,
  TranscriptionFailedError,
  UnsupportedFormatError,
} from '../../common/errors/pipeline.errors';

const audio = Buffer.from('audio-bytes');

describe('TranscriptionService', () => {
  it('normalizes the engine output', async () => {
    const engine = new ScriptedTranscriptionEngine([
      {
        duration: 6,
        segments: [
          { start: 3, end: 6, text: 'second', speaker: null },
          { start: 0.2, end: 3, text: ' first ', speaker: null },
        ],
      },
    ]);
    const service = new TranscriptionService(engine);

    await expect(service.transcribe(audio, 'audio/mpeg')).resolves.toEqual({
      duration: 6,
      segments: [
        { start: 0, end: 3, text: 'first', speaker: null },
        { start: 3, end: 6, text: 'second', speaker: null },
      ],
    });
    expect(engine.formats).toEqual([AudioFormat.MP3]);
  });

  it('rejects unsupported formats before calling the engine', async () => {
    const engine = new ScriptedTranscriptionEngine([new Error('should not be called')]);
    const service = new TranscriptionService(engine);

    await expect(service.transcribe(audio, 'audio/ogg')).rejects.toBeInstanceOf(UnsupportedFormatError);
    await expect(service.transcribe(audio, 'constructor')).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(engine.calls).toBe(0);
  });

  it('wraps transient engine errors as retryable TranscriptionFailed', async () => {
    const service = new TranscriptionService(
      new ScriptedTranscriptionEngine([new ProviderHttpError('Deepgram', 503, 'unavailable')]),
    );

    const error = await service.transcribe(audio, AudioFormat.WAV).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TranscriptionFailedError);
    expect(error).toMatchObject({
      code: PipelineErrorCode.TRANSCRIPTION_FAILED,
      transient: true,
      message: 'scripted transcription failed: Deepgram API error: 503 - unavailable',
    });
  });

  it('marks client errors as permanent', async () => {
    const service = new TranscriptionService(
      new ScriptedTranscriptionEngine([new ProviderHttpError('Deepgram', 400, 'corrupt audio')]),
    );

    await expect(service.transcribe(audio, AudioFormat.WAV)).rejects.toMatchObject({
      transient: false,
    });
  });

  it('passes timeouts through untouched', async () => {
    const timeout = new StageTimeoutError(100);
    const service = new TranscriptionService(new ScriptedTranscriptionEngine([timeout]));

    await expect(service.transcribe(audio, AudioFormat.WAV)).rejects.toBe(timeout);
  });

  it('fails when the engine finds no speech', async () => {
    const service = new TranscriptionService(
      new ScriptedTranscriptionEngine([{ duration: 12, segments: [] }]),
    );

    await expect(service.transcribe(audio, AudioFormat.WAV)).rejects.toThrow(
      'scripted returned no speech',
    );
  });

  it('joins segment text line by line', () => {
    expect(TranscriptionService.joinText([{ text: 'a' }, { text: 'b' }])).toBe('a\nb');
  });
});
