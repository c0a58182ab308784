import {
  CancelledError,
  StageTimeoutError,
  isTransientError,
} from '../errors/pipeline.errors';

export interface RetryOptions {
  /** 首次调用之外的最大重试次数 */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * 取消原因统一转成字符串
 */
export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === 'string' && reason ? reason : 'aborted';
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(abortReason(signal));
  }
}

/**
 * 可被取消的 sleep
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(abortReason(signal)));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(signal ? abortReason(signal) : 'aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 为外部调用加超时
 * fn 收到的 signal 在超时或上游取消时 abort；超时抛 StageTimeoutError（可重试），取消抛 CancelledError
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  throwIfCancelled(parent);

  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new StageTimeoutError(timeoutMs));
      reject(new StageTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => {
        if (!timedOut) reject(new CancelledError(abortReason(controller.signal)));
      },
      { once: true },
    );
  });
  // 未胜出的 Promise 的 rejection 不应变成 unhandled
  deadline.catch(() => undefined);
  cancelled.catch(() => undefined);

  try {
    return await Promise.race([fn(controller.signal), deadline, cancelled]);
  } catch (error) {
    if (timedOut) throw new StageTimeoutError(timeoutMs);
    if (parent?.aborted) throw new CancelledError(abortReason(parent));
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * 指数退避重试，仅重试瞬时错误
 * 第 n 次重试前等待 min(baseDelayMs * 2^(n-1), maxDelayMs)
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    throwIfCancelled(options.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.retries || !isTransientError(error)) {
        throw error;
      }
      const delayMs = Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
