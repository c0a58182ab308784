import { UnsupportedFormatError } from '../errors/pipeline.errors';
import { AudioSource } from './audio-source';

// Layer III 比特率表（kbps），下标为 header 中的 bitrate index
const BITRATES_V1 = [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320];
const BITRATES_V2 = [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160];

const SAMPLE_RATES: Record<number, number[]> = {
  3: [44100, 48000, 32000], // MPEG-1
  2: [22050, 24000, 16000], // MPEG-2
  0: [11025, 12000, 8000], // MPEG-2.5
};

interface FrameHeader {
  length: number;
  sampleRate: number;
  samplesPerFrame: number;
}

interface Frame {
  offset: number;
  length: number;
}

/**
 * 解析 MPEG 音频帧头，仅支持 Layer III
 */
export function readFrameHeader(buffer: Buffer, pos: number): FrameHeader | null {
  if (pos + 4 > buffer.length) return null;
  const b1 = buffer[pos + 1];
  const b2 = buffer[pos + 2];
  if (buffer[pos] !== 0xff || (b1 & 0xe0) !== 0xe0) return null;

  const version = (b1 >> 3) & 0x03;
  const layer = (b1 >> 1) & 0x03;
  const bitrateIndex = b2 >> 4;
  const sampleRateIndex = (b2 >> 2) & 0x03;
  const padding = (b2 >> 1) & 0x01;

  const rates = SAMPLE_RATES[version];
  if (!rates || layer !== 0x01 || sampleRateIndex === 3) return null;
  if (bitrateIndex === 0 || bitrateIndex === 15) return null;

  const isV1 = version === 3;
  const bitrate = (isV1 ? BITRATES_V1 : BITRATES_V2)[bitrateIndex] * 1000;
  const sampleRate = rates[sampleRateIndex];

  return {
    length: Math.floor(((isV1 ? 144 : 72) * bitrate) / sampleRate) + padding,
    sampleRate,
    samplesPerFrame: isV1 ? 1152 : 576,
  };
}

/**
 * 跳过开头的 ID3v2 标签
 */
function skipId3v2(buffer: Buffer): number {
  if (buffer.length < 10 || buffer.toString('latin1', 0, 3) !== 'ID3') return 0;
  // syncsafe integer
  const size =
    ((buffer[6] & 0x7f) << 21) |
    ((buffer[7] & 0x7f) << 14) |
    ((buffer[8] & 0x7f) << 7) |
    (buffer[9] & 0x7f);
  const hasFooter = (buffer[5] & 0x10) !== 0;
  return 10 + size + (hasFooter ? 10 : 0);
}

/**
 * 打开 MP3，按帧边界切割（不重新编码）
 */
export function openMp3(buffer: Buffer): AudioSource {
  const frames: Frame[] = [];
  let first: FrameHeader | null = null;
  let pos = skipId3v2(buffer);

  while (pos + 4 <= buffer.length) {
    const header = readFrameHeader(buffer, pos);
    if (!header || (first && header.sampleRate !== first.sampleRate)) {
      if (buffer.toString('latin1', pos, pos + 3) === 'TAG') break; // ID3v1
      pos++;
      continue;
    }
    if (pos + header.length > buffer.length) break; // 末尾不完整的帧
    first = first ?? header;
    frames.push({ offset: pos, length: header.length });
    pos += header.length;
  }

  if (!first || frames.length === 0) {
    throw new UnsupportedFormatError('mp3 (no MPEG Layer III frames found)');
  }

  const { sampleRate, samplesPerFrame } = first;

  return {
    duration: (frames.length * samplesPerFrame) / sampleRate,

    cut(start: number, end: number): Buffer {
      const startIndex = Math.floor((start * sampleRate) / samplesPerFrame);
      const endIndex = Math.min(Math.ceil((end * sampleRate) / samplesPerFrame), frames.length);
      return Buffer.concat(
        frames
          .slice(startIndex, endIndex)
          .map((frame) => buffer.subarray(frame.offset, frame.offset + frame.length)),
      );
    },
  };
}
