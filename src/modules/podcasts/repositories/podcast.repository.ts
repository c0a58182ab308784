import {
  AudioFormat,
  Clip,
  KeyPoint,
  PipelineStage,
  Podcast,
  PodcastStatus,
  TranscriptSegment,
} from '../../../database/entities';

export interface NewPodcast {
  id: string;
  owner_id: string;
  title: string;
  audio_key: string;
  audio_format: AudioFormat;
  size_bytes: number | null;
  attempt_id: string;
}

export interface ListPodcastsQuery {
  ownerId: string;
  status?: PodcastStatus;
  cursor?: string; // created_at 游标
  limit: number;
}

export interface StageFailure {
  stage: PipelineStage | null;
  code: string;
  message: string;
}

/**
 * 每次阶段转移随状态一起写入的产物
 */
export type StageArtifacts =
  | { to: PodcastStatus.TRANSCRIBING }
  | { to: PodcastStatus.EXTRACTING; segments: TranscriptSegment[]; durationSec: number }
  | { to: PodcastStatus.SLICING; keyPoints: KeyPoint[] }
  | { to: PodcastStatus.COMPLETE; clips: Clip[] };

export interface StageCommit {
  podcastId: string;
  attemptId: string;
  from: PodcastStatus;
  artifacts: StageArtifacts;
}

/**
 * 播客持久化
 * commitStage / markFailed / restart 都是条件更新（比较 status 与 attempt_id），
 * 条件不满足时返回 null，调用方据此判断是否被其他执行者抢占
 */
export abstract class PodcastRepository {
  abstract create(podcast: NewPodcast): Promise<Podcast>;

  abstract findById(id: string): Promise<Podcast | null>;

  abstract list(query: ListPodcastsQuery): Promise<Podcast[]>;

  abstract delete(id: string): Promise<void>;

  /** 原子写入阶段产物并推进状态 */
  abstract commitStage(commit: StageCommit): Promise<Podcast | null>;

  /** 非终态 → failed；attemptId 为 null 时不校验轮次 */
  abstract markFailed(
    id: string,
    attemptId: string | null,
    failure: StageFailure,
  ): Promise<Podcast | null>;

  /** failed → pending，丢弃上一轮所有产物并切换到新轮次 */
  abstract restart(id: string, attemptId: string): Promise<Podcast | null>;

  /** 停留在未结束状态（含 pending）且 updated_at 早于 before 的播客 */
  abstract findStale(before: Date): Promise<Podcast[]>;

  abstract getSegments(podcastId: string): Promise<TranscriptSegment[]>;

  abstract getKeyPoints(podcastId: string): Promise<KeyPoint[]>;

  abstract getClips(podcastId: string): Promise<Clip[]>;

  abstract findKeyPoint(id: string): Promise<KeyPoint | null>;

  abstract findClip(id: string): Promise<Clip | null>;

  abstract deleteClip(id: string): Promise<void>;
}
