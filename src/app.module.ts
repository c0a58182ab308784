import { Module, DynamicModule, ModuleMetadata } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule, ConfigService } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { SupabaseModule } from './providers/supabase/supabase.module';
import { R2Module } from './providers/r2/r2.module';
import { DeepgramModule } from './providers/deepgram/deepgram.module';
import { OpenAIModule } from './providers/openai/openai.module';

// Business Modules
import { UploadModule } from './modules/upload/upload.module';
import { PodcastsModule } from './modules/podcasts/podcasts.module';
import { PipelineModule } from './modules/pipeline/pipeline.module';
import { HealthModule } from './modules/health/health.module';

// Guards
import { AuthGuard } from './common/guards/auth.guard';

type Imports = NonNullable<ModuleMetadata['imports']>;

@Module({})
export class AppModule {
  static forRoot(): DynamicModule {
    const imports: Imports = [
      // Config
      ConfigModule.forRoot({
        isGlobal: true,
        load: [configuration],
        envFilePath: ['.env.local', '.env'],
      }),

      // Schedule (定时任务)
      ScheduleModule.forRoot(),

      // Providers
      SupabaseModule,
      R2Module,
      DeepgramModule,
      OpenAIModule,

      // Business Modules
      UploadModule,
      PodcastsModule,
      HealthModule,
    ];

    // 只有当 REDIS_ENABLED=true 时才加载 BullMQ
    if (process.env.REDIS_ENABLED === 'true') {
      imports.push(AppModule.bullRoot());
    }

    return {
      module: AppModule,
      imports,
      providers: [
        {
          provide: APP_GUARD,
          useClass: AuthGuard,
        },
      ],
    };
  }

  /**
   * Worker 进程：只加载流水线，不注册 HTTP 控制器
   */
  static forWorker(): DynamicModule {
    const imports: Imports = [
      ConfigModule.forRoot({
        isGlobal: true,
        load: [configuration],
        envFilePath: ['.env.local', '.env'],
      }),
      ScheduleModule.forRoot(),
      SupabaseModule,
      R2Module,
      DeepgramModule,
      OpenAIModule,
      PipelineModule,
    ];

    if (process.env.REDIS_ENABLED === 'true') {
      imports.push(AppModule.bullRoot());
    }

    return { module: AppModule, imports };
  }

  private static bullRoot(): DynamicModule {
    return BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: {
          url: configService.get<string>('redis.url'),
        },
      }),
      inject: [ConfigService],
    });
  }
}
