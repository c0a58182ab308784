import { UnsupportedFormatError } from '../errors/pipeline.errors';
import { AudioSource } from './audio-source';

interface WavLayout {
  fmtChunk: Buffer; // 完整的 fmt chunk body，原样写回以保持编码
  dataOffset: number;
  dataLength: number;
  sampleRate: number;
  blockAlign: number;
}

function readChunks(buffer: Buffer): WavLayout {
  if (
    buffer.length < 12 ||
    buffer.toString('ascii', 0, 4) !== 'RIFF' ||
    buffer.toString('ascii', 8, 12) !== 'WAVE'
  ) {
    throw new UnsupportedFormatError('wav (missing RIFF/WAVE header)');
  }

  let fmtChunk: Buffer | null = null;
  let pos = 12;

  while (pos + 8 <= buffer.length) {
    const id = buffer.toString('ascii', pos, pos + 4);
    const size = buffer.readUInt32LE(pos + 4);
    const body = pos + 8;

    if (id === 'fmt ') {
      if (size < 16) throw new UnsupportedFormatError('wav (truncated fmt chunk)');
      fmtChunk = buffer.subarray(body, body + size);
    } else if (id === 'data') {
      if (!fmtChunk) throw new UnsupportedFormatError('wav (data before fmt chunk)');
      const blockAlign = fmtChunk.readUInt16LE(12);
      const sampleRate = fmtChunk.readUInt32LE(4);
      if (blockAlign === 0 || sampleRate === 0) {
        throw new UnsupportedFormatError('wav (invalid fmt chunk)');
      }
      // 流式写入的文件 data size 可能是占位值，按实际长度截断到整帧
      const available = Math.min(size, buffer.length - body);
      return {
        fmtChunk,
        dataOffset: body,
        dataLength: available - (available % blockAlign),
        sampleRate,
        blockAlign,
      };
    }

    pos = body + size + (size % 2);
  }

  throw new UnsupportedFormatError('wav (missing data chunk)');
}

function chunkHeader(id: string, size: number): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, 'ascii');
  header.writeUInt32LE(size, 4);
  return header;
}

/**
 * 打开 PCM WAV，按采样帧精确切割
 */
export function openWav(buffer: Buffer): AudioSource {
  const layout = readChunks(buffer);
  const totalFrames = layout.dataLength / layout.blockAlign;

  return {
    duration: totalFrames / layout.sampleRate,

    cut(start: number, end: number): Buffer {
      const startFrame = Math.min(Math.round(start * layout.sampleRate), totalFrames);
      const endFrame = Math.min(Math.round(end * layout.sampleRate), totalFrames);
      const data = buffer.subarray(
        layout.dataOffset + startFrame * layout.blockAlign,
        layout.dataOffset + endFrame * layout.blockAlign,
      );

      const fmtPad = layout.fmtChunk.length % 2;
      const dataPad = data.length % 2;
      const riffSize =
        4 + 8 + layout.fmtChunk.length + fmtPad + 8 + data.length + dataPad;

      return Buffer.concat([
        chunkHeader('RIFF', riffSize),
        Buffer.from('WAVE', 'ascii'),
        chunkHeader('fmt ', layout.fmtChunk.length),
        layout.fmtChunk,
        Buffer.alloc(fmtPad),
        chunkHeader('data', data.length),
        data,
        Buffer.alloc(dataPad),
      ]);
    },
  };
}
