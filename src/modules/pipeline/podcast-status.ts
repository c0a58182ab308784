import { PipelineStage, PodcastStatus } from '../../database/entities';

// 正向推进顺序
export const STATUS_SEQUENCE: readonly PodcastStatus[] = [
  PodcastStatus.PENDING,
  PodcastStatus.TRANSCRIBING,
  PodcastStatus.EXTRACTING,
  PodcastStatus.SLICING,
  PodcastStatus.COMPLETE,
];

export const IN_PROGRESS_STATUSES: readonly PodcastStatus[] = [
  PodcastStatus.TRANSCRIBING,
  PodcastStatus.EXTRACTING,
  PodcastStatus.SLICING,
];

export const NON_TERMINAL_STATUSES: readonly PodcastStatus[] = [
  PodcastStatus.PENDING,
  ...IN_PROGRESS_STATUSES,
];

export function isTerminal(status: PodcastStatus): boolean {
  return status === PodcastStatus.COMPLETE || status === PodcastStatus.FAILED;
}

/**
 * 合法转移：
 * - 沿 STATUS_SEQUENCE 前进一步
 * - 任意非终态 → failed
 * - failed → pending（显式重启）
 */
export function canTransition(from: PodcastStatus, to: PodcastStatus): boolean {
  if (to === PodcastStatus.FAILED) return !isTerminal(from);
  if (from === PodcastStatus.FAILED) return to === PodcastStatus.PENDING;
  const index = STATUS_SEQUENCE.indexOf(from);
  return index >= 0 && STATUS_SEQUENCE[index + 1] === to;
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: PodcastStatus,
    readonly to: PodcastStatus,
  ) {
    super(`Illegal podcast status transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function assertTransition(from: PodcastStatus, to: PodcastStatus): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}

/**
 * 处于某状态时正在执行的阶段
 */
export function stageOf(status: PodcastStatus): PipelineStage | null {
  switch (status) {
    case PodcastStatus.TRANSCRIBING:
      return PipelineStage.TRANSCRIBE;
    case PodcastStatus.EXTRACTING:
      return PipelineStage.EXTRACT;
    case PodcastStatus.SLICING:
      return PipelineStage.SLICE;
    default:
      return null;
  }
}
