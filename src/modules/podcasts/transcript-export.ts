import { TranscriptSegment } from '../../database/entities';

export type TranscriptFormat = 'json' | 'srt' | 'vtt';

/**
 * 生成 SRT 格式字幕
 */
export function generateSRT(segments: TranscriptSegment[]): string {
  return segments
    .map((seg, i) => {
      const startTime = formatTimestamp(seg.start_sec, ',');
      const endTime = formatTimestamp(seg.end_sec, ',');
      return `${i + 1}\n${startTime} --> ${endTime}\n${cueText(seg)}\n`;
    })
    .join('\n');
}

/**
 * 生成 VTT 格式字幕
 */
export function generateVTT(segments: TranscriptSegment[]): string {
  const header = 'WEBVTT\n\n';
  const body = segments
    .map((seg) => {
      const startTime = formatTimestamp(seg.start_sec, '.');
      const endTime = formatTimestamp(seg.end_sec, '.');
      return `${startTime} --> ${endTime}\n${cueText(seg)}\n`;
    })
    .join('\n');
  return header + body;
}

function cueText(seg: TranscriptSegment): string {
  return seg.speaker ? `${seg.speaker}: ${seg.text}` : seg.text;
}

// HH:MM:SS{sep}mmm，按毫秒取整避免浮点误差（1.999999 → 00:00:02,000）
export function formatTimestamp(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.round(seconds * 1000);
  const h = Math.floor(totalMs / 3_600_000);
  const m = Math.floor((totalMs % 3_600_000) / 60_000);
  const s = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}${separator}${String(ms).padStart(3, '0')}`;
}
