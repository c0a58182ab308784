import {
  Clip,
  KeyPoint,
  Podcast,
  PodcastStatus,
  TranscriptSegment,
} from '../database/entities';
import {
  ListPodcastsQuery,
  NewPodcast,
  PodcastRepository,
  StageCommit,
  StageFailure,
} from '../modules/podcasts/repositories/podcast.repository';
import { NON_TERMINAL_STATUSES, assertTransition } from '../modules/pipeline/podcast-status';

/**
 * 内存版 PodcastRepository，条件更新语义与 commit_podcast_stage / restart_podcast 一致
 */
export class InMemoryPodcastRepository extends PodcastRepository {
  readonly podcasts = new Map<string, Podcast>();
  readonly segments = new Map<string, TranscriptSegment[]>();
  readonly keyPoints = new Map<string, KeyPoint[]>();
  readonly clips = new Map<string, Clip[]>();
  // 每个播客经历过的状态（含初始 pending）
  readonly history = new Map<string, PodcastStatus[]>();

  private clock = Date.parse('2026-01-01T00:00:00.000Z');

  async create(podcast: NewPodcast): Promise<Podcast> {
    const now = this.tick();
    const row: Podcast = {
      ...podcast,
      status: PodcastStatus.PENDING,
      failed_stage: null,
      error_code: null,
      error: null,
      attempt_count: 1,
      duration_sec: null,
      created_at: now,
      updated_at: now,
    };
    this.podcasts.set(row.id, row);
    this.history.set(row.id, [row.status]);
    return { ...row };
  }

  async findById(id: string): Promise<Podcast | null> {
    const row = this.podcasts.get(id);
    return row ? { ...row } : null;
  }

  async list(query: ListPodcastsQuery): Promise<Podcast[]> {
    return [...this.podcasts.values()]
      .filter((p) => p.owner_id === query.ownerId)
      .filter((p) => !query.status || p.status === query.status)
      .filter((p) => !query.cursor || p.created_at < query.cursor)
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, query.limit)
      .map((p) => ({ ...p }));
  }

  async delete(id: string): Promise<void> {
    this.podcasts.delete(id);
    this.segments.delete(id);
    this.keyPoints.delete(id);
    this.clips.delete(id);
  }

  async commitStage(commit: StageCommit): Promise<Podcast | null> {
    const { artifacts } = commit;
    assertTransition(commit.from, artifacts.to);

    const row = this.podcasts.get(commit.podcastId);
    if (!row || row.status !== commit.from || row.attempt_id !== commit.attemptId) {
      return null;
    }

    switch (artifacts.to) {
      case PodcastStatus.EXTRACTING:
        this.segments.set(row.id, artifacts.segments.map((s) => ({ ...s })));
        row.duration_sec = artifacts.durationSec;
        break;
      case PodcastStatus.SLICING:
        this.keyPoints.set(row.id, artifacts.keyPoints.map((k) => ({ ...k })));
        break;
      case PodcastStatus.COMPLETE:
        this.clips.set(row.id, artifacts.clips.map((c) => ({ ...c })));
        break;
      default:
        break;
    }

    this.setStatus(row, artifacts.to);
    return { ...row };
  }

  async markFailed(
    id: string,
    attemptId: string | null,
    failure: StageFailure,
  ): Promise<Podcast | null> {
    const row = this.podcasts.get(id);
    if (!row || !NON_TERMINAL_STATUSES.includes(row.status)) return null;
    if (attemptId && row.attempt_id !== attemptId) return null;

    row.failed_stage = failure.stage;
    row.error_code = failure.code;
    row.error = failure.message;
    this.setStatus(row, PodcastStatus.FAILED);
    return { ...row };
  }

  async restart(id: string, attemptId: string): Promise<Podcast | null> {
    const row = this.podcasts.get(id);
    if (!row || row.status !== PodcastStatus.FAILED) return null;

    row.attempt_id = attemptId;
    row.attempt_count += 1;
    row.failed_stage = null;
    row.error_code = null;
    row.error = null;
    row.duration_sec = null;
    this.segments.delete(id);
    this.keyPoints.delete(id);
    this.clips.delete(id);
    this.setStatus(row, PodcastStatus.PENDING);
    return { ...row };
  }

  async findStale(before: Date): Promise<Podcast[]> {
    const threshold = before.toISOString();
    return [...this.podcasts.values()]
      .filter((p) => NON_TERMINAL_STATUSES.includes(p.status))
      .filter((p) => p.updated_at < threshold)
      .map((p) => ({ ...p }));
  }

  async getSegments(podcastId: string): Promise<TranscriptSegment[]> {
    return (this.segments.get(podcastId) ?? []).map((s) => ({ ...s }));
  }

  async getKeyPoints(podcastId: string): Promise<KeyPoint[]> {
    return (this.keyPoints.get(podcastId) ?? []).map((k) => ({ ...k }));
  }

  async getClips(podcastId: string): Promise<Clip[]> {
    return (this.clips.get(podcastId) ?? []).map((c) => ({ ...c }));
  }

  async findKeyPoint(id: string): Promise<KeyPoint | null> {
    for (const points of this.keyPoints.values()) {
      const found = points.find((k) => k.id === id);
      if (found) return { ...found };
    }
    return null;
  }

  async findClip(id: string): Promise<Clip | null> {
    for (const clips of this.clips.values()) {
      const found = clips.find((c) => c.id === id);
      if (found) return { ...found };
    }
    return null;
  }

  async deleteClip(id: string): Promise<void> {
    for (const [podcastId, clips] of this.clips) {
      this.clips.set(
        podcastId,
        clips.filter((c) => c.id !== id),
      );
    }
  }

  /** 把 updated_at 改到指定时间（模拟长时间无进展） */
  touch(id: string, updatedAt: string): void {
    const row = this.podcasts.get(id);
    if (row) row.updated_at = updatedAt;
  }

  private setStatus(row: Podcast, status: PodcastStatus): void {
    row.status = status;
    row.updated_at = this.tick();
    this.history.get(row.id)?.push(status);
  }

  // 单调递增的时间戳，保证 created_at 排序稳定
  private tick(): string {
    this.clock += 1000;
    return new Date(this.clock).toISOString();
  }
}
