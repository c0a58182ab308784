/**
 * 播客处理状态
 * pending → transcribing → extracting → slicing → complete，任意非终态可跳到 failed
 */
export enum PodcastStatus {
  PENDING = 'pending',
  TRANSCRIBING = 'transcribing',
  EXTRACTING = 'extracting',
  SLICING = 'slicing',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

/**
 * 流水线阶段
 */
export enum PipelineStage {
  TRANSCRIBE = 'transcribe',
  EXTRACT = 'extract',
  SLICE = 'slice',
}

/**
 * 音频格式（决定转录 Content-Type 与切片方式）
 */
export enum AudioFormat {
  MP3 = 'mp3',
  WAV = 'wav',
}

/**
 * 播客实体（对应 podcasts 表）
 */
export interface Podcast {
  id: string; // uuid
  owner_id: string;
  title: string;
  audio_key: string; // R2 中的原始音频 key
  audio_format: AudioFormat;
  size_bytes: number | null;
  status: PodcastStatus;
  failed_stage: PipelineStage | null;
  error_code: string | null;
  error: string | null;
  attempt_id: string; // 当前处理轮次，重试时重新生成
  attempt_count: number;
  duration_sec: number | null; // 转录完成后回填
  created_at: string;
  updated_at: string;
}
