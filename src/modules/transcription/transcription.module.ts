import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TranscriptionService } from './transcription.service';
import { TranscriptionEngine } from './transcription-engine';
import { DeepgramEngine } from './engines/deepgram.engine';
import { WhisperEngine } from './engines/whisper.engine';

@Module({
  providers: [
    DeepgramEngine,
    WhisperEngine,
    {
      // 按配置选择引擎：deepgram（默认）| whisper
      provide: TranscriptionEngine,
      useFactory: (config: ConfigService, deepgram: DeepgramEngine, whisper: WhisperEngine) =>
        config.get<string>('transcription.engine') === 'whisper' ? whisper : deepgram,
      inject: [ConfigService, DeepgramEngine, WhisperEngine],
    },
    TranscriptionService,
  ],
  exports: [TranscriptionService],
})
export class TranscriptionModule {}
