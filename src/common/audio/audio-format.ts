import { AudioFormat } from '../../database/entities';
import { UnsupportedFormatError } from '../errors/pipeline.errors';

// 声明格式（MIME 或扩展名）→ 内部格式
// Map 而非对象字面量：不会命中 constructor / __proto__ 等原型键
const FORMAT_ALIASES = new Map<string, AudioFormat>([
  ['mp3', AudioFormat.MP3],
  ['audio/mpeg', AudioFormat.MP3],
  ['audio/mp3', AudioFormat.MP3],
  ['audio/mpeg3', AudioFormat.MP3],
  ['audio/x-mpeg-3', AudioFormat.MP3],
  ['wav', AudioFormat.WAV],
  ['wave', AudioFormat.WAV],
  ['audio/wav', AudioFormat.WAV],
  ['audio/wave', AudioFormat.WAV],
  ['audio/x-wav', AudioFormat.WAV],
  ['audio/vnd.wave', AudioFormat.WAV],
]);

export const AUDIO_MIME_TYPES: Record<AudioFormat, string> = {
  [AudioFormat.MP3]: 'audio/mpeg',
  [AudioFormat.WAV]: 'audio/wav',
};

export const SUPPORTED_AUDIO_TYPES = [...FORMAT_ALIASES.keys()].filter((alias) =>
  alias.includes('/'),
);

/**
 * 解析声明的音频格式，不支持时抛 UnsupportedFormatError
 */
export function resolveAudioFormat(declared: string): AudioFormat {
  const normalized = declared.split(';')[0].trim().toLowerCase().replace(/^\./, '');
  const format = FORMAT_ALIASES.get(normalized);
  if (!format) {
    throw new UnsupportedFormatError(declared);
  }
  return format;
}

export function isAudioFormat(value: string): value is AudioFormat {
  return Object.values<string>(AudioFormat).includes(value);
}
