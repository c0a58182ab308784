import { ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { PodcastsService } from './podcasts.service';
import { PodcastStatus } from '../../database/entities';
import { UnsupportedFormatError } from '../../common/errors/pipeline.errors';
import {
  PipelineHarness,
  TEN_MINUTE_WAV,
  createPipelineHarness,
} from '../../testing/pipeline-harness';

const owner = { id: 'user-1' };
const stranger = { id: 'user-2' };

describe('PodcastsService', () => {
  let h: PipelineHarness;
  let service: PodcastsService;

  beforeEach(async () => {
    h = await createPipelineHarness();
    service = new PodcastsService(h.repository, h.pipeline, h.queue, h.storage);
  });

  async function completedPodcast() {
    const podcast = await h.createPodcast();
    await h.pipeline.run(podcast.id);
    return podcast;
  }

  describe('createPodcast', () => {
    it('stores the podcast and processes it in the background', async () => {
      h.storage.put('uploads/user-1/show.wav', TEN_MINUTE_WAV, 'audio/wav');

      const created = await service.createPodcast(
        { title: 'Morning Show', audio_key: 'uploads/user-1/show.wav' },
        owner,
      );
      expect(created).toMatchObject({
        title: 'Morning Show',
        status: PodcastStatus.PENDING,
        audio_format: 'wav',
        attempt_count: 1,
        error: null,
      });

      await h.queue.onIdle();
      const detail = await service.getPodcast(created.podcast_id, owner);
      const stored = await h.repository.findById(created.podcast_id);

      expect(detail.status).toBe(PodcastStatus.COMPLETE);
      expect(detail.key_points.map((k) => k.content)).toEqual(['Compounding', 'Tracking', 'Environment']);
      expect(detail.clips).toHaveLength(3);
      expect(detail.clips[0].download_url).toBe(
        `https://storage.test/clips/${created.podcast_id}/${stored?.attempt_id}/${detail.key_points[0].id}.wav?expires=3600`,
      );
      expect(detail.clips[0]).not.toHaveProperty('audio_key');
    });

    it('rejects an unsupported format without storing anything', async () => {
      await expect(
        service.createPodcast(
          { title: 'Ogg', audio_key: 'uploads/user-1/show.ogg', content_type: 'audio/ogg' },
          owner,
        ),
      ).rejects.toBeInstanceOf(UnsupportedFormatError);
      expect(h.repository.podcasts.size).toBe(0);
    });

    it("refuses another user's upload", async () => {
      h.storage.put('uploads/user-2/private.wav', TEN_MINUTE_WAV, 'audio/wav');

      await expect(
        service.createPodcast({ title: 'Borrowed', audio_key: 'uploads/user-2/private.wav' }, owner),
      ).rejects.toBeInstanceOf(ForbiddenException);
      await expect(
        service.createPodcast({ title: 'Legacy', audio_key: 'uploads/user-1-private.wav' }, owner),
      ).rejects.toBeInstanceOf(ForbiddenException);
      expect(h.repository.podcasts.size).toBe(0);
      expect(h.storage.objects.has('uploads/user-2/private.wav')).toBe(true);
    });
  });

  describe('access control', () => {
    it('hides other users podcasts', async () => {
      const podcast = await h.createPodcast();
      await expect(service.getPodcast(podcast.id, stranger)).rejects.toBeInstanceOf(ForbiddenException);
    });

    it('reports unknown podcasts', async () => {
      await expect(service.getPodcast('missing', owner)).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  it('pages through the owner podcasts, newest first', async () => {
    await h.createPodcast();
    await h.createPodcast();
    await h.createPodcast();
    await h.createPodcast({ owner_id: stranger.id });

    const first = await service.getPodcasts({ limit: 2 }, owner);
    expect(first.items.map((p) => p.title)).toEqual(['Episode 3', 'Episode 2']);
    expect(first.next_cursor).toBe(first.items[1].created_at);

    const second = await service.getPodcasts({ limit: 2, cursor: first.next_cursor ?? undefined }, owner);
    expect(second.items.map((p) => p.title)).toEqual(['Episode 1']);
    expect(second.next_cursor).toBeNull();
  });

  describe('retryPodcast', () => {
    it('refuses podcasts that have not failed', async () => {
      const podcast = await h.createPodcast();
      await expect(service.retryPodcast(podcast.id, owner)).rejects.toBeInstanceOf(ConflictException);
    });

    it('restarts a failed podcast and processes it again', async () => {
      const podcast = await h.createPodcast();
      await service.cancelPodcast(podcast.id, owner);

      const retried = await service.retryPodcast(podcast.id, owner);
      expect(retried.status).toBe(PodcastStatus.PENDING);
      expect(retried.attempt_count).toBe(2);

      await h.queue.onIdle();
      expect((await h.repository.findById(podcast.id))?.status).toBe(PodcastStatus.COMPLETE);
    });
  });

  describe('cancelPodcast', () => {
    it('fails a pending podcast with the given reason', async () => {
      const podcast = await h.createPodcast();

      const cancelled = await service.cancelPodcast(podcast.id, owner, 'wrong file');

      expect(cancelled.status).toBe(PodcastStatus.FAILED);
      expect(cancelled.error).toEqual({
        stage: null,
        code: 'CANCELLED',
        message: 'pipeline: CANCELLED: Cancelled: wrong file',
      });
    });

    it('refuses finished podcasts', async () => {
      const podcast = await completedPodcast();
      await expect(service.cancelPodcast(podcast.id, owner)).rejects.toBeInstanceOf(ConflictException);
    });
  });

  describe('getTranscript', () => {
    it('is not available before transcription', async () => {
      const podcast = await h.createPodcast();
      await expect(service.getTranscript(podcast.id, owner, 'json')).rejects.toBeInstanceOf(
        ConflictException,
      );
    });

    it('exports json and subtitles', async () => {
      const podcast = await completedPodcast();

      const json = await service.getTranscript(podcast.id, owner, 'json');
      expect(json).toMatchObject({ format: 'json', duration_sec: 600 });
      expect(json.format === 'json' && json.segments[1]).toEqual({
        start: 95,
        end: 210,
        text: 'Small habits compound into large results over years.',
        speaker: 'Speaker 0',
      });

      const srt = await service.getTranscript(podcast.id, owner, 'srt');
      expect(srt.format === 'srt' && srt.content.split('\n\n')[0]).toBe(
        '1\n00:00:00,000 --> 00:01:35,000\nSpeaker 0: Intro and welcome to the episode about habits.',
      );

      const vtt = await service.getTranscript(podcast.id, owner, 'vtt');
      expect(vtt.format === 'vtt' && vtt.content.startsWith('WEBVTT\n\n00:00:00.000 --> 00:01:35.000\n')).toBe(true);
    });
  });

  describe('clips', () => {
    it('builds a share link for a key point clip', async () => {
      const podcast = await completedPodcast();
      const [keyPoint] = await h.repository.getKeyPoints(podcast.id);

      const share = await service.shareKeyPoint(keyPoint.id, owner);
      const url = new URL(share.share_url);

      expect(url.origin + url.pathname).toBe('https://www.facebook.com/sharer/sharer.php');
      expect(url.searchParams.get('u')).toBe(share.clip_url);
      expect(url.searchParams.get('quote')).toBe('Compounding');
      expect(url.searchParams.get('title')).toBe('Key Point from Episode 1');
      expect(share.clip_url.endsWith('?expires=604800')).toBe(true);
    });

    it('deletes a single clip and its object', async () => {
      const podcast = await completedPodcast();
      const [clip] = await h.repository.getClips(podcast.id);

      await service.deleteClip(clip.id, owner);

      expect(await h.repository.findClip(clip.id)).toBeNull();
      expect(h.storage.objects.has(clip.audio_key)).toBe(false);
      expect(await service.getClips(podcast.id, owner)).toHaveLength(2);
    });
  });

  it('deletes a podcast with its source audio and clips', async () => {
    const podcast = await completedPodcast();
    const clips = await h.repository.getClips(podcast.id);

    await expect(service.deletePodcast(podcast.id, owner)).resolves.toEqual({ deleted: true });

    expect(await h.repository.findById(podcast.id)).toBeNull();
    expect(h.storage.deleted).toEqual([podcast.audio_key, ...clips.map((c) => c.audio_key)]);
  });
});
