import { PodcastStatus, PipelineStage } from '../../database/entities';
import { FIVE_SEGMENTS, createPipelineHarness } from '../../testing/pipeline-harness';

describe('PipelineCleanupService', () => {
  const now = new Date('2026-03-01T12:00:00.000Z');

  it('fails podcasts that made no progress for too long', async () => {
    const h = await createPipelineHarness();
    const stuck = await h.createPodcast();
    await h.repository.commitStage({
      podcastId: stuck.id,
      attemptId: stuck.attempt_id,
      from: PodcastStatus.PENDING,
      artifacts: { to: PodcastStatus.TRANSCRIBING },
    });
    h.repository.touch(stuck.id, '2026-03-01T11:00:00.000Z');

    const result = await h.cleanup.cleanupStalePodcasts(now);

    expect(result).toEqual({ failed: 1, requeued: 0 });
    const podcast = await h.repository.findById(stuck.id);
    expect(podcast?.status).toBe(PodcastStatus.FAILED);
    expect(podcast?.failed_stage).toBe(PipelineStage.TRANSCRIBE);
    expect(podcast?.error).toBe('transcribe: STAGE_TIMEOUT: no progress for 30 minutes');
  });

  it('leaves recent and queued podcasts alone', async () => {
    const h = await createPipelineHarness({
      transcription: [{ hangMs: 200 }, FIVE_SEGMENTS],
      pipeline: { concurrency: 1 },
    });
    const blocker = await h.createPodcast();
    const pending = await h.createPodcast();
    // 单槽：blocker 执行中，pending 在池中排队
    await h.queue.enqueue(blocker.id, blocker.attempt_id);
    await h.queue.enqueue(pending.id, pending.attempt_id);
    while (h.engine.calls === 0) {
      await new Promise((resolve) => setTimeout(resolve, 1));
    }
    h.repository.touch(pending.id, '2026-03-01T08:00:00.000Z');

    const recent = await h.createPodcast();
    await h.repository.commitStage({
      podcastId: recent.id,
      attemptId: recent.attempt_id,
      from: PodcastStatus.PENDING,
      artifacts: { to: PodcastStatus.TRANSCRIBING },
    });
    h.repository.touch(recent.id, '2026-03-01T11:45:00.000Z');

    expect(await h.cleanup.cleanupStalePodcasts(now)).toEqual({ failed: 0, requeued: 0 });
    expect((await h.repository.findById(pending.id))?.status).toBe(PodcastStatus.PENDING);
    expect((await h.repository.findById(recent.id))?.status).toBe(PodcastStatus.TRANSCRIBING);

    await h.queue.onIdle();
    expect((await h.repository.findById(pending.id))?.status).toBe(PodcastStatus.COMPLETE);
  });

  it('requeues a pending podcast that has no queued job', async () => {
    const h = await createPipelineHarness();
    const orphan = await h.createPodcast();
    h.repository.touch(orphan.id, '2026-03-01T08:00:00.000Z');

    expect(await h.cleanup.cleanupStalePodcasts(now)).toEqual({ failed: 0, requeued: 1 });
    await h.queue.onIdle();

    expect((await h.repository.findById(orphan.id))?.status).toBe(PodcastStatus.COMPLETE);
  });

  it('skips podcasts still running in this process', async () => {
    const h = await createPipelineHarness({ transcription: [{ hangMs: 200 }] });
    const podcast = await h.createPodcast();

    const running = h.pipeline.run(podcast.id);
    while (h.engine.calls === 0) {
      await new Promise((resolve) => setTimeout(resolve, 1));
    }
    // 本进程执行中的不处理
    h.repository.touch(podcast.id, '2026-03-01T11:00:00.000Z');
    expect(await h.cleanup.cleanupStalePodcasts(now)).toEqual({ failed: 0, requeued: 0 });

    await running;
  });
});
