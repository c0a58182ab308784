/**
 * 关键点实体（对应 key_points 表）
 */
export interface KeyPoint {
  id: string; // uuid
  podcast_id: string;
  content: string;
  quote: string | null; // 模型给出的原文片段
  start_sec: number;
  end_sec: number;
  created_at: string;
}
