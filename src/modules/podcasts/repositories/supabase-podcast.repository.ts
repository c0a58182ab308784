import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../../providers/supabase/supabase.service';
import {
  Clip,
  KeyPoint,
  Podcast,
  PodcastStatus,
  TranscriptSegment,
} from '../../../database/entities';
import {
  NON_TERMINAL_STATUSES,
  assertTransition,
} from '../../pipeline/podcast-status';
import {
  ListPodcastsQuery,
  NewPodcast,
  PodcastRepository,
  StageCommit,
  StageFailure,
} from './podcast.repository';

/**
 * Supabase（Postgres）实现
 * 阶段提交与重启走 SQL 函数，保证产物与状态在同一事务内写入
 * @see supabase/migrations/0001_podcasts.sql
 */
@Injectable()
export class SupabasePodcastRepository extends PodcastRepository {
  private readonly logger = new Logger(SupabasePodcastRepository.name);

  constructor(private supabaseService: SupabaseService) {
    super();
  }

  private get db() {
    return this.supabaseService.getClient();
  }

  async create(podcast: NewPodcast): Promise<Podcast> {
    const now = new Date().toISOString();
    const { data, error } = await this.db
      .from('podcasts')
      .insert({
        ...podcast,
        status: PodcastStatus.PENDING,
        attempt_count: 1,
        created_at: now,
        updated_at: now,
      })
      .select()
      .returns<Podcast[]>()
      .single();

    if (error) {
      this.logger.error(`Failed to create podcast: ${error.message}`);
      throw error;
    }
    return data;
  }

  async findById(id: string): Promise<Podcast | null> {
    const { data, error } = await this.db
      .from('podcasts')
      .select('*')
      .eq('id', id)
      .returns<Podcast[]>()
      .maybeSingle();

    if (error) throw error;
    return data;
  }

  async list(query: ListPodcastsQuery): Promise<Podcast[]> {
    let builder = this.db
      .from('podcasts')
      .select('*')
      .eq('owner_id', query.ownerId)
      .order('created_at', { ascending: false })
      .limit(query.limit);

    if (query.status) {
      builder = builder.eq('status', query.status);
    }
    if (query.cursor) {
      builder = builder.lt('created_at', query.cursor);
    }

    const { data, error } = await builder.returns<Podcast[]>();
    if (error) {
      this.logger.error(`Failed to fetch podcasts: ${error.message}`);
      throw error;
    }
    return data;
  }

  async delete(id: string): Promise<void> {
    // transcript_segments / key_points / clips 通过外键 ON DELETE CASCADE 一并删除
    const { error } = await this.db.from('podcasts').delete().eq('id', id);
    if (error) throw error;
  }

  async commitStage(commit: StageCommit): Promise<Podcast | null> {
    const { artifacts } = commit;
    assertTransition(commit.from, artifacts.to);

    const { data, error } = await this.db
      .rpc('commit_podcast_stage', {
        p_podcast_id: commit.podcastId,
        p_attempt_id: commit.attemptId,
        p_from: commit.from,
        p_to: artifacts.to,
        p_duration_sec: artifacts.to === PodcastStatus.EXTRACTING ? artifacts.durationSec : null,
        p_segments: artifacts.to === PodcastStatus.EXTRACTING ? artifacts.segments : [],
        p_key_points: artifacts.to === PodcastStatus.SLICING ? artifacts.keyPoints : [],
        p_clips: artifacts.to === PodcastStatus.COMPLETE ? artifacts.clips : [],
      })
      .returns<Podcast[]>()
      .maybeSingle();

    if (error) {
      this.logger.error(`Failed to commit stage ${commit.from} -> ${artifacts.to}: ${error.message}`);
      throw error;
    }
    return data;
  }

  async markFailed(
    id: string,
    attemptId: string | null,
    failure: StageFailure,
  ): Promise<Podcast | null> {
    let builder = this.db
      .from('podcasts')
      .update({
        status: PodcastStatus.FAILED,
        failed_stage: failure.stage,
        error_code: failure.code,
        error: failure.message,
        updated_at: new Date().toISOString(),
      })
      .eq('id', id)
      .in('status', [...NON_TERMINAL_STATUSES]);

    if (attemptId) {
      builder = builder.eq('attempt_id', attemptId);
    }

    const { data, error } = await builder.select().returns<Podcast[]>().maybeSingle();
    if (error) {
      this.logger.error(`Failed to mark podcast ${id} failed: ${error.message}`);
      throw error;
    }
    return data;
  }

  async restart(id: string, attemptId: string): Promise<Podcast | null> {
    const { data, error } = await this.db
      .rpc('restart_podcast', { p_podcast_id: id, p_attempt_id: attemptId })
      .returns<Podcast[]>()
      .maybeSingle();

    if (error) throw error;
    return data;
  }

  async findStale(before: Date): Promise<Podcast[]> {
    const { data, error } = await this.db
      .from('podcasts')
      .select('*')
      .in('status', [...NON_TERMINAL_STATUSES])
      .lt('updated_at', before.toISOString())
      .returns<Podcast[]>();

    if (error) throw error;
    return data;
  }

  async getSegments(podcastId: string): Promise<TranscriptSegment[]> {
    const { data, error } = await this.db
      .from('transcript_segments')
      .select('*')
      .eq('podcast_id', podcastId)
      .order('seq', { ascending: true })
      .returns<TranscriptSegment[]>();

    if (error) throw error;
    return data;
  }

  async getKeyPoints(podcastId: string): Promise<KeyPoint[]> {
    const { data, error } = await this.db
      .from('key_points')
      .select('*')
      .eq('podcast_id', podcastId)
      .order('start_sec', { ascending: true })
      .returns<KeyPoint[]>();

    if (error) throw error;
    return data;
  }

  async getClips(podcastId: string): Promise<Clip[]> {
    const { data, error } = await this.db
      .from('clips')
      .select('*')
      .eq('podcast_id', podcastId)
      .order('created_at', { ascending: true })
      .returns<Clip[]>();

    if (error) throw error;
    return data;
  }

  async findKeyPoint(id: string): Promise<KeyPoint | null> {
    const { data, error } = await this.db
      .from('key_points')
      .select('*')
      .eq('id', id)
      .returns<KeyPoint[]>()
      .maybeSingle();

    if (error) throw error;
    return data;
  }

  async findClip(id: string): Promise<Clip | null> {
    const { data, error } = await this.db
      .from('clips')
      .select('*')
      .eq('id', id)
      .returns<Clip[]>()
      .maybeSingle();

    if (error) throw error;
    return data;
  }

  async deleteClip(id: string): Promise<void> {
    const { error } = await this.db.from('clips').delete().eq('id', id);
    if (error) throw error;
  }
}
