import { TimedSegment, TranscriptResult } from './transcription-engine';

const round = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * 规范化引擎输出，使片段有序、互不重叠且恰好覆盖 [0, duration]
 * - 丢弃空文本与非法时间
 * - 重叠部分裁到前一片段的 end；被完全覆盖的片段文本并入前一片段
 * - 空隙并入前一片段（首片段从 0 开始，末片段延伸到 duration）
 */
export function normalizeSegments(result: TranscriptResult): TranscriptResult {
  const valid = result.segments.filter(
    (seg) => seg.text.trim() !== '' && Number.isFinite(seg.start) && Number.isFinite(seg.end),
  );
  const maxEnd = valid.reduce((max, seg) => Math.max(max, seg.end), 0);
  const duration = round(result.duration > 0 ? result.duration : maxEnd);
  const clamp = (value: number) => round(Math.min(Math.max(value, 0), duration));

  const sorted = valid
    .map((seg) => ({
      start: clamp(seg.start),
      end: clamp(seg.end),
      text: seg.text.trim(),
      speaker: seg.speaker,
    }))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const segments: TimedSegment[] = [];
  for (const seg of sorted) {
    const prev = segments[segments.length - 1];
    if (!prev) {
      segments.push({ ...seg, start: 0 });
      continue;
    }
    const start = Math.max(seg.start, prev.end);
    if (seg.end <= start) {
      prev.text = `${prev.text} ${seg.text}`;
      continue;
    }
    prev.end = start;
    segments.push({ ...seg, start });
  }

  // 首片段可能是零长度（clamp 到 0 之后），并入下一片段
  if (segments.length > 1 && segments[0].end <= segments[0].start) {
    const [head, next] = segments;
    next.start = 0;
    next.text = `${head.text} ${next.text}`;
    segments.shift();
  }

  const last = segments[segments.length - 1];
  if (last) {
    last.end = duration;
  }

  return { duration, segments };
}
