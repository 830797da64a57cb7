import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { HealthModule } from './health/health.module';
import { PromptsModule } from './prompts/prompts.module';
import { EvaluationModule } from './evaluation';
import { WorkflowModule } from './workflow/workflow.module';
import { LoggerModule } from './common/logger';
import { PerformanceInterceptor } from './common/interceptors';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env' }),
    LoggerModule,
    PromptsModule,
    EvaluationModule,
    WorkflowModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: PerformanceInterceptor,
    },
  ],
})
export class AppModule {}
