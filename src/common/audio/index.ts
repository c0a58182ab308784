import { AudioFormat } from '../../database/entities';
import { AudioSource } from './audio-source';
import { openMp3 } from './mp3.codec';
import { openWav } from './wav.codec';

export * from './audio-format';
export * from './audio-source';

/**
 * 按格式解析音频
 */
export function openAudio(buffer: Buffer, format: AudioFormat): AudioSource {
  switch (format) {
    case AudioFormat.WAV:
      return openWav(buffer);
    case AudioFormat.MP3:
      return openMp3(buffer);
  }
}
