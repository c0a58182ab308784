import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

/**
 * Worker 入口
 * 独立进程运行，消费 BullMQ 队列中的流水线任务
 */
async function bootstrap() {
  const logger = new Logger('Worker');

  if (process.env.REDIS_ENABLED !== 'true') {
    logger.warn('REDIS_ENABLED is not true, the worker has no queue to consume');
  }

  // 创建应用上下文（不启动 HTTP 服务）
  const app = await NestFactory.createApplicationContext(AppModule.forWorker());

  logger.log('Worker started and listening for jobs...');

  // 优雅关闭：进行中的流水线被取消并标记为 failed
  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}, shutting down...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${String(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((error: unknown) => {
  new Logger('Worker').error(`Failed to start: ${String(error)}`);
  process.exit(1);
});
