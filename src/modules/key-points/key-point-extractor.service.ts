import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OpenAIService } from '../../providers/openai/openai.service';
import {
  ExtractionFailedError,
  PipelineError,
  errorMessage,
  isTransientError,
} from '../../common/errors/pipeline.errors';
import { TimedSegment } from '../transcription/transcription-engine';
import { matchToSegments } from './key-point-matcher';

export interface KeyPointDraft {
  content: string;
  quote: string | null;
  start: number;
  end: number;
}

export interface ExtractOptions {
  signal?: AbortSignal;
}

interface RawKeyPoint {
  content: string;
  quote: string | null;
  start_time: number;
  end_time: number;
}

// 浮点误差容忍
const EPSILON = 1e-6;

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

@Injectable()
export class KeyPointExtractorService {
  private readonly logger = new Logger(KeyPointExtractorService.name);
  private readonly maxKeyPoints: number;
  private readonly minQuoteMatch: number;

  constructor(
    private openAIService: OpenAIService,
    private configService: ConfigService,
  ) {
    this.maxKeyPoints = this.configService.get<number>('keyPoints.maxKeyPoints') || 8;
    this.minQuoteMatch = this.configService.get<number>('keyPoints.minQuoteMatch') || 12;
  }

  /**
   * 提取关键点并映射回转录时间范围，结果按 start 排序，数量不超过 maxKeyPoints
   */
  async extract(
    transcriptText: string,
    segments: TimedSegment[],
    options: ExtractOptions = {},
  ): Promise<KeyPointDraft[]> {
    if (segments.length === 0 || !transcriptText.trim()) {
      throw new ExtractionFailedError('Transcript is empty');
    }

    let content: string;
    try {
      content = await this.openAIService.extractKeyPoints(
        {
          transcript: transcriptText,
          segments: segments.map((seg, i) => ({ i, s: seg.start, e: seg.end, t: seg.text })),
        },
        this.maxKeyPoints,
        options.signal,
      );
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new ExtractionFailedError(`Key point extraction failed: ${errorMessage(error)}`, {
        transient: isTransientError(error),
        cause: error,
      });
    }

    const coverage = { start: segments[0].start, end: segments[segments.length - 1].end };
    const raw = this.parse(content).slice(0, this.maxKeyPoints);

    const drafts = raw.map((point, index) => {
      this.assertInCoverage(point, index, coverage);
      const range = matchToSegments(
        point.quote ?? point.content,
        { start: point.start_time, end: point.end_time },
        segments,
        this.minQuoteMatch,
      );
      return { content: point.content, quote: point.quote, ...range };
    });

    drafts.sort((a, b) => a.start - b.start || a.end - b.end);
    this.logger.log(`Extracted ${drafts.length} key points`);
    return drafts;
  }

  /**
   * 解析模型输出，格式不符时抛 ExtractionFailedError
   */
  parse(content: string): RawKeyPoint[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new ExtractionFailedError('Model returned invalid JSON');
    }

    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('key_points' in parsed) ||
      !Array.isArray(parsed.key_points)
    ) {
      throw new ExtractionFailedError('Model output is missing the key_points array');
    }

    return parsed.key_points.map((item: unknown, index: number): RawKeyPoint => {
      if (typeof item !== 'object' || item === null) {
        throw new ExtractionFailedError(`Key point ${index} is not an object`);
      }
      const text = 'content' in item && typeof item.content === 'string' ? item.content.trim() : '';
      if (!text) {
        throw new ExtractionFailedError(`Key point ${index} has no content`);
      }
      const start = 'start_time' in item ? item.start_time : undefined;
      const end = 'end_time' in item ? item.end_time : undefined;
      if (!isFiniteNumber(start) || !isFiniteNumber(end)) {
        throw new ExtractionFailedError(`Key point ${index} is missing timestamps`);
      }
      const quote = 'quote' in item && typeof item.quote === 'string' && item.quote.trim()
        ? item.quote.trim()
        : null;
      return { content: text, quote, start_time: start, end_time: end };
    });
  }

  private assertInCoverage(
    point: RawKeyPoint,
    index: number,
    coverage: { start: number; end: number },
  ): void {
    const { start_time: start, end_time: end } = point;
    if (start < 0 || start < coverage.start - EPSILON) {
      throw new ExtractionFailedError(`Key point ${index} starts before the transcript (${start}s)`);
    }
    if (start >= end) {
      throw new ExtractionFailedError(`Key point ${index} has an empty range [${start}, ${end}]`);
    }
    if (end > coverage.end + EPSILON) {
      throw new ExtractionFailedError(
        `Key point ${index} ends at ${end}s, beyond transcript coverage (${coverage.end}s)`,
      );
    }
  }
}
