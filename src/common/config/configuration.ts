const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  port: int(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',

  supabase: {
    url: process.env.SUPABASE_URL,
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY,
  },

  r2: {
    bucket: process.env.R2_BUCKET,
    accessKey: process.env.R2_ACCESS_KEY,
    secretKey: process.env.R2_SECRET_KEY,
    endpoint: process.env.R2_ENDPOINT,
    publicUrl: process.env.R2_PUBLIC_URL,
  },

  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
  },

  deepgram: {
    apiKey: process.env.DEEPGRAM_API_KEY,
    model: process.env.DEEPGRAM_MODEL || 'nova-3',
  },

  openai: {
    apiKey: process.env.OPENAI_API_KEY,
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    transcriptionModel: process.env.OPENAI_TRANSCRIPTION_MODEL || 'whisper-1',
  },

  // 转录引擎：deepgram | whisper
  transcription: {
    engine: process.env.TRANSCRIPTION_ENGINE || 'deepgram',
  },

  keyPoints: {
    maxKeyPoints: int(process.env.MAX_KEY_POINTS, 8),
    minQuoteMatch: 12, // quote 与 segment 的最短公共子串（字符），不足则按时间重叠匹配
  },

  clips: {
    reencodeFormat: process.env.CLIP_REENCODE_FORMAT || null, // mp3 | wav，为空则保持原编码
    ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
  },

  // 流水线配置
  pipeline: {
    maxRetries: int(process.env.PIPELINE_MAX_RETRIES, 3),
    baseDelayMs: int(process.env.PIPELINE_BASE_DELAY_MS, 2000),
    maxDelayMs: int(process.env.PIPELINE_MAX_DELAY_MS, 30000),
    stageTimeoutMs: int(process.env.PIPELINE_STAGE_TIMEOUT_MS, 300000),
    concurrency: int(process.env.PIPELINE_CONCURRENCY, 2),
    rateLimitMax: int(process.env.PIPELINE_RATE_LIMIT_MAX, 10), // 每个窗口内最多启动的任务数
    rateLimitDurationMs: int(process.env.PIPELINE_RATE_LIMIT_DURATION_MS, 60000),
    staleAfterMinutes: int(process.env.PIPELINE_STALE_AFTER_MINUTES, 30),
  },

  upload: {
    maxSizeBytes: 100 * 1024 * 1024, // 100MB
  },
});
