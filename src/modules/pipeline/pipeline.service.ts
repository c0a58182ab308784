import { Injectable, Logger, NotFoundException, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  Clip,
  KeyPoint,
  PipelineStage,
  Podcast,
  PodcastStatus,
  TranscriptSegment,
} from '../../database/entities';
import { ObjectStorage } from '../../providers/r2/object-storage';
import { AUDIO_MIME_TYPES } from '../../common/audio';
import {
  CancelledError,
  PipelineError,
  StorageFailedError,
  errorMessage,
} from '../../common/errors/pipeline.errors';
import { retryWithBackoff, throwIfCancelled, withTimeout } from '../../common/utils/async';
import { KeyedMutex } from '../../common/utils/keyed-mutex';
import { PodcastRepository, StageArtifacts } from '../podcasts/repositories/podcast.repository';
import { TranscriptionService } from '../transcription/transcription.service';
import { KeyPointExtractorService } from '../key-points/key-point-extractor.service';
import { ClipSlicerService } from '../clips/clip-slicer.service';
import { stageOf } from './podcast-status';

export interface RunOptions {
  /** 队列任务携带的轮次；与当前轮次不符或已失败时跳过，不会自动重启 */
  attemptId?: string;
  signal?: AbortSignal;
}

/**
 * 阶段提交时发现状态或轮次已被改变（取消、超时清理、删除）
 */
class AttemptSupersededError extends Error {
  constructor(podcastId: string, from: PodcastStatus) {
    super(`Podcast ${podcastId} is no longer ${from} for this attempt`);
    this.name = 'AttemptSupersededError';
  }
}

const round = (value: number): number => Math.round(value * 1000) / 1000;

function toStorageError(error: unknown, action: string): PipelineError {
  if (error instanceof PipelineError) return error;
  const permanent =
    error instanceof Error && /NoSuchKey|NotFound|AccessDenied|not configured/.test(
      `${error.name} ${error.message}`,
    );
  return new StorageFailedError(`Storage ${action} failed: ${errorMessage(error)}`, {
    transient: !permanent,
    cause: error,
  });
}

/**
 * 播客处理流水线
 * pending → transcribing → extracting → slicing → complete，失败进入 failed
 * 每个阶段的产物与状态推进一起原子提交；外部调用带超时，瞬时错误按指数退避重试
 */
@Injectable()
export class PipelineService implements OnModuleDestroy {
  private readonly logger = new Logger(PipelineService.name);
  private readonly lock = new KeyedMutex();
  private readonly inFlight = new Map<string, AbortController>();
  private closing = false;
  private readonly retries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly stageTimeoutMs: number;

  constructor(
    private podcastRepository: PodcastRepository,
    private storage: ObjectStorage,
    private transcriptionService: TranscriptionService,
    private keyPointExtractor: KeyPointExtractorService,
    private clipSlicer: ClipSlicerService,
    private configService: ConfigService,
  ) {
    this.retries = this.configService.get<number>('pipeline.maxRetries') ?? 3;
    this.baseDelayMs = this.configService.get<number>('pipeline.baseDelayMs') ?? 2000;
    this.maxDelayMs = this.configService.get<number>('pipeline.maxDelayMs') ?? 30000;
    this.stageTimeoutMs = this.configService.get<number>('pipeline.stageTimeoutMs') ?? 300000;
  }

  /**
   * 本进程内是否有该播客的执行
   */
  isRunning(podcastId: string): boolean {
    return this.inFlight.has(podcastId);
  }

  /**
   * 执行流水线（同一播客串行）
   * complete → 直接返回；failed → 重启后执行（携带 attemptId 时跳过）；其他执行者持有的进行中状态 → 不处理
   */
  async run(podcastId: string, options: RunOptions = {}): Promise<Podcast> {
    return this.lock.runExclusive(podcastId, async () => {
      let podcast = await this.requirePodcast(podcastId);

      if (this.closing) {
        this.logger.warn(`Shutting down, podcast ${podcastId} left ${podcast.status}`);
        return podcast;
      }

      if (options.attemptId && options.attemptId !== podcast.attempt_id) {
        this.logger.log(`Skipping stale job for podcast ${podcastId} (attempt ${options.attemptId})`);
        return podcast;
      }

      if (podcast.status === PodcastStatus.COMPLETE) {
        this.logger.log(`Podcast ${podcastId} already complete, skipping`);
        return podcast;
      }

      if (podcast.status === PodcastStatus.FAILED) {
        if (options.attemptId) {
          this.logger.log(`Podcast ${podcastId} attempt ${options.attemptId} already failed, skipping`);
          return podcast;
        }
        podcast = await this.restartLocked(podcast);
      }

      if (podcast.status !== PodcastStatus.PENDING) {
        this.logger.warn(`Podcast ${podcastId} is ${podcast.status} in another worker, skipping`);
        return podcast;
      }

      const controller = new AbortController();
      const onAbort = () => controller.abort(options.signal?.reason);
      options.signal?.addEventListener('abort', onAbort, { once: true });
      if (options.signal?.aborted) onAbort();
      this.inFlight.set(podcastId, controller);

      try {
        return await this.execute(podcast, controller.signal);
      } finally {
        this.inFlight.delete(podcastId);
        options.signal?.removeEventListener('abort', onAbort);
      }
    });
  }

  /**
   * failed → pending，丢弃上一轮产物
   */
  async restart(podcastId: string): Promise<Podcast> {
    return this.lock.runExclusive(podcastId, async () =>
      this.restartLocked(await this.requirePodcast(podcastId)),
    );
  }

  /**
   * 取消处理，播客最终处于 failed（CANCELLED）
   * 本进程执行中的直接 abort 并等待其落定；否则按轮次条件更新为 failed，
   * 其他 worker 上的执行会在下一次阶段提交时发现并停止
   */
  async cancel(podcastId: string, reason = 'cancelled by user'): Promise<Podcast> {
    const controller = this.inFlight.get(podcastId);
    if (controller) {
      this.logger.log(`Cancelling in-flight pipeline for podcast ${podcastId}: ${reason}`);
      controller.abort(reason);
      return this.lock.runExclusive(podcastId, () => this.requirePodcast(podcastId));
    }

    const podcast = await this.requirePodcast(podcastId);
    if (podcast.status === PodcastStatus.COMPLETE || podcast.status === PodcastStatus.FAILED) {
      return podcast;
    }

    const error = new CancelledError(reason);
    const stage = stageOf(podcast.status);
    const failed = await this.podcastRepository.markFailed(podcastId, podcast.attempt_id, {
      stage,
      code: error.code,
      message: this.describe(stage, error.code, error),
    });
    return failed ?? this.requirePodcast(podcastId);
  }

  /**
   * 关闭时取消本进程所有执行，保证不留下无错误信息的中间状态；之后不再启动新的执行
   */
  async onModuleDestroy(): Promise<void> {
    this.closing = true;
    const ids = [...this.inFlight.keys()];
    if (ids.length === 0) return;
    this.logger.warn(`Shutting down with ${ids.length} in-flight pipelines, cancelling...`);
    await Promise.all(ids.map((id) => this.cancel(id, 'worker shutting down')));
  }

  private async execute(initial: Podcast, signal: AbortSignal): Promise<Podcast> {
    const { id: podcastId, attempt_id: attemptId } = initial;
    let current = initial;
    let stage: PipelineStage | null = null;
    const uploadedKeys: string[] = [];

    this.logger.log(`Processing podcast ${podcastId} (attempt ${attemptId})`);

    try {
      throwIfCancelled(signal);

      // 1. 转录
      stage = PipelineStage.TRANSCRIBE;
      current = await this.advance(current, { to: PodcastStatus.TRANSCRIBING });

      const audio = await this.callExternal(
        'download audio',
        (s) =>
          this.storage.downloadFile(current.audio_key, s).catch((error: unknown) => {
            throw toStorageError(error, 'download');
          }),
        signal,
      );
      const transcript = await this.callExternal(
        'transcribe',
        (s) => this.transcriptionService.transcribe(audio, current.audio_format, { signal: s }),
        signal,
      );
      const segments: TranscriptSegment[] = transcript.segments.map((seg, seq) => ({
        podcast_id: podcastId,
        seq,
        start_sec: seg.start,
        end_sec: seg.end,
        text: seg.text,
        speaker: seg.speaker,
      }));
      current = await this.advance(current, {
        to: PodcastStatus.EXTRACTING,
        segments,
        durationSec: transcript.duration,
      });
      this.logger.log(`Podcast ${podcastId}: ${segments.length} transcript segments saved`);

      // 2. 关键点
      stage = PipelineStage.EXTRACT;
      const drafts = await this.callExternal(
        'extract key points',
        (s) =>
          this.keyPointExtractor.extract(
            TranscriptionService.joinText(transcript.segments),
            transcript.segments,
            { signal: s },
          ),
        signal,
      );
      const extractedAt = new Date().toISOString();
      const keyPoints: KeyPoint[] = drafts.map((draft) => ({
        id: uuidv4(),
        podcast_id: podcastId,
        content: draft.content,
        quote: draft.quote,
        start_sec: draft.start,
        end_sec: draft.end,
        created_at: extractedAt,
      }));
      current = await this.advance(current, { to: PodcastStatus.SLICING, keyPoints });
      this.logger.log(`Podcast ${podcastId}: ${keyPoints.length} key points saved`);

      // 3. 切片并上传
      stage = PipelineStage.SLICE;
      const sliced = await this.clipSlicer.slice(
        audio,
        current.audio_format,
        keyPoints.map((kp) => ({ start: kp.start_sec, end: kp.end_sec })),
        { signal },
      );
      throwIfCancelled(signal);

      const slicedAt = new Date().toISOString();
      const uploads = await Promise.allSettled(
        sliced.map(async (clip, index): Promise<Clip> => {
          const keyPoint = keyPoints[index];
          const key = `clips/${podcastId}/${attemptId}/${keyPoint.id}.${clip.format}`;
          uploadedKeys.push(key);
          await this.callExternal(
            'upload clip',
            (s) =>
              this.storage
                .uploadFile(key, clip.data, AUDIO_MIME_TYPES[clip.format], s)
                .catch((error: unknown) => {
                  throw toStorageError(error, 'upload');
                }),
            signal,
          );
          return {
            id: uuidv4(),
            key_point_id: keyPoint.id,
            podcast_id: podcastId,
            audio_key: key,
            audio_format: clip.format,
            size_bytes: clip.data.length,
            duration_sec: round(keyPoint.end_sec - keyPoint.start_sec),
            created_at: slicedAt,
          };
        }),
      );
      const clips: Clip[] = [];
      for (const upload of uploads) {
        if (upload.status === 'rejected') throw upload.reason;
        clips.push(upload.value);
      }

      current = await this.advance(current, { to: PodcastStatus.COMPLETE, clips });
      this.logger.log(`Podcast ${podcastId} completed with ${clips.length} clips`);
      return current;
    } catch (error) {
      return this.fail(current, stage, error, uploadedKeys);
    }
  }

  /**
   * 原子提交阶段产物并推进状态；条件不满足说明本轮已被取代
   */
  private async advance(current: Podcast, artifacts: StageArtifacts): Promise<Podcast> {
    const next = await this.podcastRepository.commitStage({
      podcastId: current.id,
      attemptId: current.attempt_id,
      from: current.status,
      artifacts,
    });
    if (!next) {
      throw new AttemptSupersededError(current.id, current.status);
    }
    return next;
  }

  /**
   * 外部调用：超时 + 瞬时错误指数退避重试
   */
  private callExternal<T>(
    label: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal,
  ): Promise<T> {
    return retryWithBackoff(() => withTimeout(fn, this.stageTimeoutMs, signal), {
      retries: this.retries,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      signal,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `${label} failed (${errorMessage(error)}), retry ${attempt}/${this.retries} in ${delayMs}ms`,
        ),
    });
  }

  private async fail(
    current: Podcast,
    stage: PipelineStage | null,
    error: unknown,
    uploadedKeys: string[],
  ): Promise<Podcast> {
    if (error instanceof PipelineError && !error.stage) {
      error.stage = stage;
    }
    const code = error instanceof PipelineError ? error.code : 'INTERNAL_ERROR';
    const message = this.describe(stage, code, error);

    if (error instanceof AttemptSupersededError) {
      this.logger.warn(message);
    } else {
      this.logger.error(`Podcast ${current.id} failed: ${message}`);
    }

    if (uploadedKeys.length > 0) {
      await this.removeObjects(uploadedKeys);
    }

    const failed = await this.podcastRepository.markFailed(current.id, current.attempt_id, {
      stage,
      code,
      message,
    });
    return failed ?? (await this.podcastRepository.findById(current.id)) ?? current;
  }

  private async restartLocked(podcast: Podcast): Promise<Podcast> {
    if (podcast.status !== PodcastStatus.FAILED) {
      return podcast;
    }
    const staleClips = await this.podcastRepository.getClips(podcast.id);
    const restarted = await this.podcastRepository.restart(podcast.id, uuidv4());
    if (!restarted) {
      return this.requirePodcast(podcast.id);
    }
    await this.removeObjects(staleClips.map((clip) => clip.audio_key));
    this.logger.log(
      `Podcast ${podcast.id} restarted (attempt ${restarted.attempt_count}, id ${restarted.attempt_id})`,
    );
    return restarted;
  }

  /**
   * 尽力删除对象；失败只记录，不影响状态
   */
  private async removeObjects(keys: string[]): Promise<void> {
    if (keys.length === 0) return;
    try {
      await this.storage.deleteFiles(keys);
    } catch (error) {
      this.logger.warn(`Failed to remove ${keys.length} objects: ${errorMessage(error)}`);
    }
  }

  describe(stage: PipelineStage | null, code: string, error: unknown): string {
    return `${stage ?? 'pipeline'}: ${code}: ${errorMessage(error)}`;
  }

  private async requirePodcast(podcastId: string): Promise<Podcast> {
    const podcast = await this.podcastRepository.findById(podcastId);
    if (!podcast) {
      throw new NotFoundException({
        code: 'NOT_FOUND',
        message: `Podcast ${podcastId} not found`,
      });
    }
    return podcast;
  }
}
