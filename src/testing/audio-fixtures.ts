export interface WavSpec {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  seconds: number;
}

/**
 * 生成 PCM WAV，第 i 个数据字节为 i % 251
 */
export function buildWav(spec: WavSpec): Buffer {
  const blockAlign = (spec.channels * spec.bitsPerSample) / 8;
  const frames = Math.round(spec.seconds * spec.sampleRate);
  const data = Buffer.alloc(frames * blockAlign);
  for (let i = 0; i < data.length; i++) data[i] = i % 251;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + data.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(spec.channels, 22);
  header.writeUInt32LE(spec.sampleRate, 24);
  header.writeUInt32LE(spec.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(spec.bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(data.length, 40);
  return Buffer.concat([header, data]);
}

// MPEG-1 Layer III, 128 kbps, 44100 Hz, 无 CRC、无 padding：帧长 417 字节，1152 采样
export const MP3_FRAME_HEADER = Buffer.from([0xff, 0xfb, 0x90, 0x00]);
export const MP3_FRAME_LENGTH = 417;

/**
 * 生成 frameCount 个 MP3 帧，帧体字节为帧序号 % 200
 */
export function buildMp3(frameCount: number, options: { id3v2?: boolean; id3v1?: boolean } = {}): Buffer {
  const parts: Buffer[] = [];
  if (options.id3v2) {
    // ID3v2.3 头 + 20 字节标签体（syncsafe size = 20）
    parts.push(Buffer.from([0x49, 0x44, 0x33, 0x03, 0x00, 0x00, 0x00, 0x00, 0x00, 0x14]));
    parts.push(Buffer.alloc(20, 0x41));
  }
  for (let i = 0; i < frameCount; i++) {
    const frame = Buffer.alloc(MP3_FRAME_LENGTH, i % 200);
    MP3_FRAME_HEADER.copy(frame, 0);
    parts.push(frame);
  }
  if (options.id3v1) {
    const tag = Buffer.alloc(128, 0x20);
    tag.write('TAG', 0, 'latin1');
    parts.push(tag);
  }
  return Buffer.concat(parts);
}
