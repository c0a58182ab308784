import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI, { toFile } from 'openai';

export interface WhisperSegment {
  start: number;
  end: number;
  text: string;
}

export interface WhisperTranscript {
  duration: number;
  segments: WhisperSegment[];
}

// 传给模型的转录片段（紧凑键名节省 token）
export interface PromptSegment {
  i: number;
  s: number;
  e: number;
  t: string;
}

// 关键点提取的模型输入：完整文本用于理解上下文，分段表用于定位时间
export interface KeyPointPrompt {
  transcript: string;
  segments: PromptSegment[];
}

function isWhisperSegment(value: unknown): value is WhisperSegment {
  return (
    typeof value === 'object' &&
    value !== null &&
    'start' in value &&
    typeof value.start === 'number' &&
    'end' in value &&
    typeof value.end === 'number' &&
    'text' in value &&
    typeof value.text === 'string'
  );
}

function isWhisperVerbose(value: unknown): value is WhisperTranscript {
  return (
    typeof value === 'object' &&
    value !== null &&
    'duration' in value &&
    typeof value.duration === 'number' &&
    'segments' in value &&
    Array.isArray(value.segments) &&
    value.segments.every(isWhisperSegment)
  );
}

@Injectable()
export class OpenAIService {
  private readonly logger = new Logger(OpenAIService.name);
  private client: OpenAI | null = null;
  private readonly model: string;
  private readonly transcriptionModel: string;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('openai.apiKey');
    this.model = this.configService.get<string>('openai.model') || 'gpt-4o-mini';
    this.transcriptionModel =
      this.configService.get<string>('openai.transcriptionModel') || 'whisper-1';

    if (apiKey) {
      // 重试由流水线统一控制
      this.client = new OpenAI({ apiKey, maxRetries: 0 });
      this.logger.log('OpenAI client initialized');
    } else {
      this.logger.warn('OPENAI_API_KEY not configured, LLM features will be disabled');
    }
  }

  private getClient(): OpenAI {
    if (!this.client) {
      throw new Error('OpenAI service not available. Please configure OPENAI_API_KEY.');
    }
    return this.client;
  }

  /**
   * Whisper 转录（verbose_json，带分段时间戳）
   */
  async transcribeAudio(
    audio: Buffer,
    filename: string,
    mimeType: string,
    signal?: AbortSignal,
  ): Promise<WhisperTranscript> {
    const file = await toFile(audio, filename, { type: mimeType });
    const response: unknown = await this.getClient().audio.transcriptions.create(
      {
        file,
        model: this.transcriptionModel,
        response_format: 'verbose_json',
        timestamp_granularities: ['segment'],
      },
      { signal },
    );

    if (!isWhisperVerbose(response)) {
      throw new Error('Whisper returned a response without segments');
    }

    this.logger.log(
      `Whisper response: duration=${response.duration}s, segments=${response.segments.length}`,
    );

    return {
      duration: response.duration,
      segments: response.segments.map((seg) => ({
        start: seg.start,
        end: seg.end,
        text: seg.text,
      })),
    };
  }

  /**
   * 从转录中提取关键点，返回模型的原始 JSON 文本
   */
  async extractKeyPoints(
    prompt: KeyPointPrompt,
    maxKeyPoints: number,
    signal?: AbortSignal,
  ): Promise<string> {
    this.logger.log(`Extracting key points from ${prompt.segments.length} segments...`);

    const response = await this.getClient().chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: this.buildKeyPointPrompt(maxKeyPoints) },
          { role: 'user', content: JSON.stringify(prompt) },
        ],
        temperature: 0.2,
        response_format: { type: 'json_object' },
      },
      { signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }

    this.logger.log(`Key point extraction done, tokens: ${response.usage?.total_tokens || 'unknown'}`);
    return content;
  }

  /**
   * 构建关键点提取 Prompt
   */
  private buildKeyPointPrompt(maxKeyPoints: number): string {
    return `你是一个播客内容编辑。从转录文本中提取最值得剪辑成短音频的关键点。

## 输入格式
JSON 对象：
- transcript：完整转录文本，用于理解上下文与判断重要性
- segments：分段数组，每个元素包含 i(索引), s(开始时间，秒), e(结束时间，秒), t(文本)，用于确定时间范围

## 输出格式
{
  "key_points": [
    { "content": "关键点摘要", "quote": "原文中最能代表该关键点的一句话", "start_time": 开始时间, "end_time": 结束时间 }
  ]
}

## 规则
1. 最多 ${maxKeyPoints} 个关键点，按重要性排序
2. start_time / end_time 必须是数字，且落在输入片段的时间范围内
3. quote 必须逐字摘自 transcript
4. content 使用转录原文的语言`;
  }
}
