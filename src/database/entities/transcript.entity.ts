/**
 * 转录片段（对应 transcript_segments 表）
 */
export interface TranscriptSegment {
  podcast_id: string;
  seq: number;
  start_sec: number;
  end_sec: number;
  text: string;
  speaker: string | null; // 说话人标识
}
