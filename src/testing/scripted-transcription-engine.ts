import { AudioFormat } from '../database/entities';
import { TranscriptionEngine, TranscriptResult } from '../modules/transcription/transcription-engine';
import { sleep } from '../common/utils/async';

type Step = TranscriptResult | Error | { hangMs: number };

/**
 * 按脚本依次返回结果、抛错或挂起的转录引擎；脚本用完后重复最后一步
 */
export class ScriptedTranscriptionEngine extends TranscriptionEngine {
  readonly name = 'scripted';
  calls = 0;
  readonly formats: AudioFormat[] = [];

  constructor(private readonly steps: Step[]) {
    super();
  }

  async transcribe(
    audio: Buffer,
    format: AudioFormat,
    signal?: AbortSignal,
  ): Promise<TranscriptResult> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    this.formats.push(format);

    if (step instanceof Error) throw step;
    if ('hangMs' in step) {
      await sleep(step.hangMs, signal);
      throw new Error('scripted engine hang finished without result');
    }
    return step;
  }
}
