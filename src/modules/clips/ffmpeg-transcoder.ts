import { spawn } from 'child_process';
import { AudioFormat } from '../../database/entities';

/** 单次转码超时 */
const FFMPEG_TIMEOUT_MS = 60_000;

/**
 * 通过系统 ffmpeg 转码（stdin → stdout），仅在显式要求重新编码时使用
 */
export class FfmpegTranscoder {
  constructor(private readonly ffmpegPath: string = 'ffmpeg') {}

  transcode(
    input: Buffer,
    from: AudioFormat,
    to: AudioFormat,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const child = spawn(
        this.ffmpegPath,
        ['-hide_banner', '-loglevel', 'error', '-f', from, '-i', 'pipe:0', '-f', to, 'pipe:1'],
        { signal, timeout: FFMPEG_TIMEOUT_MS },
      );

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => reject(new Error(`ffmpeg failed to start: ${error.message}`)));
      child.on('close', (code) => {
        if (code === 0) {
          resolve(Buffer.concat(stdout));
        } else {
          const detail = Buffer.concat(stderr).toString('utf8').trim();
          reject(new Error(`ffmpeg exited with code ${code}: ${detail}`));
        }
      });

      // ffmpeg 提前退出时写入会 EPIPE，由 close 事件统一报告
      child.stdin.on('error', () => undefined);
      child.stdin.end(input);
    });
  }
}
