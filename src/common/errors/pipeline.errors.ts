import { PipelineStage } from '../../database/entities';

/**
 * 流水线错误码
 */
export enum PipelineErrorCode {
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  TRANSCRIPTION_FAILED = 'TRANSCRIPTION_FAILED',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  INVALID_RANGE = 'INVALID_RANGE',
  STAGE_TIMEOUT = 'STAGE_TIMEOUT',
  CANCELLED = 'CANCELLED',
  STORAGE_FAILED = 'STORAGE_FAILED',
  TRANSCODE_FAILED = 'TRANSCODE_FAILED',
}

interface PipelineErrorOptions {
  transient?: boolean;
  stage?: PipelineStage;
  cause?: unknown;
}

/**
 * 流水线错误基类
 * transient = true 的错误可按退避策略重试，其余立即失败
 */
export class PipelineError extends Error {
  readonly transient: boolean;
  stage: PipelineStage | null;

  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options: PipelineErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.transient = options.transient ?? false;
    this.stage = options.stage ?? null;
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(format: string) {
    super(PipelineErrorCode.UNSUPPORTED_FORMAT, `Unsupported audio format: ${format}`);
  }
}

export class TranscriptionFailedError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(PipelineErrorCode.TRANSCRIPTION_FAILED, message, options);
  }
}

export class ExtractionFailedError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(PipelineErrorCode.EXTRACTION_FAILED, message, options);
  }
}

export class InvalidRangeError extends PipelineError {
  constructor(start: number, end: number, reason: string) {
    super(PipelineErrorCode.INVALID_RANGE, `Invalid range [${start}, ${end}]: ${reason}`);
  }
}

export class StageTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super(PipelineErrorCode.STAGE_TIMEOUT, `External call timed out after ${timeoutMs}ms`, {
      transient: true,
    });
  }
}

export class CancelledError extends PipelineError {
  constructor(reason: string) {
    super(PipelineErrorCode.CANCELLED, `Cancelled: ${reason}`);
  }
}

export class StorageFailedError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(PipelineErrorCode.STORAGE_FAILED, message, options);
  }
}

export class TranscodeFailedError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(PipelineErrorCode.TRANSCODE_FAILED, message, options);
  }
}

/**
 * 外部服务 HTTP 错误（Deepgram 等直接 fetch 的调用）
 */
export class ProviderHttpError extends Error {
  constructor(
    readonly provider: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${provider} API error: ${status} - ${body}`);
    this.name = 'ProviderHttpError';
  }
}

/**
 * 根据状态码判断是否为瞬时错误：5xx、408、429（配额耗尽除外）
 */
export function isTransientStatus(status: number, body = ''): boolean {
  if (status >= 500 || status === 408) {
    return true;
  }
  if (status === 429) {
    return !/insufficient_quota|quota exceeded|quota_exceeded/i.test(body);
  }
  return false;
}

/**
 * 判断任意外部错误是否可重试
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.transient;
  }
  if (error instanceof ProviderHttpError) {
    return isTransientStatus(error.status, error.body);
  }
  if (error instanceof Error) {
    // fetch 网络错误 / OpenAI SDK 的连接错误
    if (error.name === 'TypeError' && /fetch failed|network/i.test(error.message)) {
      return true;
    }
    if (error.name === 'APIConnectionError' || error.name === 'APIConnectionTimeoutError') {
      return true;
    }
    if ('status' in error && typeof error.status === 'number') {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : error.message;
      return isTransientStatus(error.status, code);
    }
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
