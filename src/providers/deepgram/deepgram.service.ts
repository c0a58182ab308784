import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderHttpError } from '../../common/errors/pipeline.errors';

/**
 * Deepgram 转录参数
 * @see https://developers.deepgram.com/docs/features
 */
export interface DeepgramTranscriptionOptions {
  /** 模型名称，默认取配置 deepgram.model */
  model?: string;
  /** 指定音频语言（BCP-47 格式），如 en, zh, ja */
  language?: string;
  /** 识别说话人变化，为每个词分配 speaker ID，默认 true */
  diarize?: boolean;
  /** 自动检测音频语言，默认 true */
  detect_language?: boolean;
  /** 将语音分割成语义单元，返回 utterances 数组，默认 true */
  utterances?: boolean;
}

export interface DeepgramWord {
  word: string;
  start: number;
  end: number;
  confidence: number;
  speaker?: number;
  punctuated_word?: string;
}

// Deepgram utterance（按语义分段的结果）
export interface DeepgramUtterance {
  start: number;
  end: number;
  confidence: number;
  channel: number;
  transcript: string;
  speaker?: number;
  words: DeepgramWord[];
}

export interface DeepgramResult {
  duration: number;
  channels: Array<{
    alternatives: Array<{
      transcript: string;
      confidence: number;
      words: DeepgramWord[];
    }>;
  }>;
  utterances: DeepgramUtterance[];
}

interface DeepgramListenResponse {
  metadata?: { duration?: number; request_id?: string };
  results?: {
    channels?: DeepgramResult['channels'];
    utterances?: DeepgramUtterance[];
  };
}

function isListenResponse(value: unknown): value is DeepgramListenResponse {
  return typeof value === 'object' && value !== null && ('results' in value || 'metadata' in value);
}

@Injectable()
export class DeepgramService implements OnModuleInit {
  private readonly logger = new Logger(DeepgramService.name);
  private apiKey = '';
  private defaultModel = 'nova-3';
  private readonly baseUrl = 'https://api.deepgram.com/v1';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    this.apiKey = this.configService.get<string>('deepgram.apiKey') || '';
    this.defaultModel = this.configService.get<string>('deepgram.model') || this.defaultModel;
    if (!this.apiKey) {
      this.logger.warn('Deepgram API key not configured');
    } else {
      this.logger.log('Deepgram service initialized');
    }
  }

  /**
   * 同步转录音频字节（等待结果）
   */
  async transcribeBuffer(
    audio: Buffer,
    contentType: string,
    options: DeepgramTranscriptionOptions = {},
    signal?: AbortSignal,
  ): Promise<DeepgramResult> {
    const params = new URLSearchParams({
      model: options.model || this.defaultModel,
      diarize: String(options.diarize ?? true), // 识别说话人
      detect_language: String(options.detect_language ?? true), // 自动检测语言
      punctuate: 'true', // 添加标点
      utterances: String(options.utterances ?? true), // 返回语义分段
    });

    if (options.language) {
      params.set('language', options.language);
    }

    const response = await fetch(`${this.baseUrl}/listen?${params.toString()}`, {
      method: 'POST',
      headers: {
        Authorization: `Token ${this.apiKey}`,
        'Content-Type': contentType,
      },
      body: audio,
      signal,
    });

    if (!response.ok) {
      throw new ProviderHttpError('Deepgram', response.status, await response.text());
    }

    const payload: unknown = await response.json();
    if (!isListenResponse(payload)) {
      throw new Error('Deepgram returned an unexpected response body');
    }

    const result: DeepgramResult = {
      duration: payload.metadata?.duration || 0,
      channels: payload.results?.channels || [],
      utterances: payload.results?.utterances || [],
    };

    this.logger.log(
      `Deepgram response: duration=${result.duration}s, ` +
        `utterances=${result.utterances.length}, ` +
        `words=${result.channels[0]?.alternatives[0]?.words.length || 0}`,
    );

    return result;
  }
}
