import { Logger } from '@nestjs/common';
import { errorMessage } from '../errors/pipeline.errors';

/**
 * 进程内有界并发池（未启用 Redis 时替代 BullMQ worker）
 */
export class BoundedPool {
  private readonly logger = new Logger(BoundedPool.name);
  private readonly queue: Array<() => Promise<void>> = [];
  private active = 0;
  private closed = false;
  private readonly idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (concurrency < 1) {
      throw new Error('Pool concurrency must be at least 1');
    }
  }

  get size(): number {
    return this.active + this.queue.length;
  }

  /**
   * 提交任务；池已关闭时返回 false
   */
  submit(task: () => Promise<void>): boolean {
    if (this.closed) return false;
    this.queue.push(task);
    this.drain();
    return true;
  }

  /**
   * 停止接收与启动任务，丢弃排队中的，返回丢弃数量；执行中的继续到结束
   */
  close(): number {
    this.closed = true;
    const dropped = this.queue.splice(0).length;
    this.notifyIdle();
    return dropped;
  }

  /**
   * 等待所有已提交任务完成
   */
  onIdle(): Promise<void> {
    if (this.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (!this.closed && this.active < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) break;
      this.active++;
      task()
        .catch((error: unknown) => this.logger.error(`Pooled task failed: ${errorMessage(error)}`))
        .finally(() => {
          this.active--;
          this.drain();
          this.notifyIdle();
        });
    }
  }

  private notifyIdle(): void {
    if (this.size === 0) {
      this.idleWaiters.splice(0).forEach((resolve) => resolve());
    }
  }
}
