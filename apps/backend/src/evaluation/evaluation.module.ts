import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { JudgmentModule } from '../judgment/judgment.module';
import { EvaluationPipelineService } from './evaluation-pipeline.service';
import { GradingConfigService } from './grading-config.service';

@Module({
  imports: [ConfigModule, JudgmentModule],
  providers: [GradingConfigService, EvaluationPipelineService],
  exports: [GradingConfigService, EvaluationPipelineService],
})
export class EvaluationModule {}
