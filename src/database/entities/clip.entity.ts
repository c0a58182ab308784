import { AudioFormat } from './podcast.entity';

/**
 * 音频片段实体（对应 clips 表，与 key_points 一对一）
 */
export interface Clip {
  id: string; // uuid
  key_point_id: string;
  podcast_id: string;
  audio_key: string;
  audio_format: AudioFormat;
  size_bytes: number;
  duration_sec: number; // = key point end - start
  created_at: string;
}
