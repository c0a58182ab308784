import { TimedSegment } from '../transcription/transcription-engine';

export interface TimeRange {
  start: number;
  end: number;
}

// 参与匹配的 quote 最大长度（字符）
const MAX_NEEDLE_LENGTH = 200;

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * 最长公共子串长度（滚动数组 DP）
 */
export function longestCommonSubstring(a: string, b: string): number {
  if (!a || !b) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  let best = 0;

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : 0;
      if (curr[j] > best) best = curr[j];
    }
    [prev, curr] = [curr, prev];
    curr.fill(0);
  }
  return best;
}

const overlap = (a: TimeRange, b: TimeRange): number =>
  Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));

/**
 * 选出锚点片段下标
 * 1. 与 quote 最长公共子串最长者（长度需 ≥ min(minQuoteMatch, quote 长度)）
 * 2. 否则取与模型时间范围重叠最多者
 * 平局取开始时间最早的片段
 */
export function findAnchorSegment(
  needle: string,
  range: TimeRange,
  segments: TimedSegment[],
  minQuoteMatch: number,
): number {
  const normalizedNeedle = normalizeText(needle).slice(0, MAX_NEEDLE_LENGTH);

  if (normalizedNeedle) {
    let bestIndex = -1;
    let bestLength = 0;
    segments.forEach((seg, index) => {
      const length = longestCommonSubstring(normalizedNeedle, normalizeText(seg.text));
      if (length > bestLength) {
        bestLength = length;
        bestIndex = index;
      }
    });
    if (bestIndex >= 0 && bestLength >= Math.min(minQuoteMatch, normalizedNeedle.length)) {
      return bestIndex;
    }
  }

  let bestIndex = 0;
  let bestOverlap = -1;
  segments.forEach((seg, index) => {
    const amount = overlap(seg, range);
    if (amount > bestOverlap) {
      bestOverlap = amount;
      bestIndex = index;
    }
  });
  return bestIndex;
}

/**
 * 将模型给出的时间范围映射回转录片段边界
 * 锚点与模型范围相交（或相接）时取二者并集覆盖的最小连续片段；
 * 不相交时以原文匹配为准，只取锚点片段
 */
export function matchToSegments(
  needle: string,
  range: TimeRange,
  segments: TimedSegment[],
  minQuoteMatch: number,
): TimeRange {
  const anchor = segments[findAnchorSegment(needle, range, segments, minQuoteMatch)];
  const touches = anchor.start <= range.end && range.start <= anchor.end;
  const lo = touches ? Math.min(range.start, anchor.start) : anchor.start;
  const hi = touches ? Math.max(range.end, anchor.end) : anchor.end;

  const first = segments.find((seg) => seg.end > lo) ?? anchor;
  const last = [...segments].reverse().find((seg) => seg.start < hi) ?? anchor;
  return { start: first.start, end: last.end };
}
