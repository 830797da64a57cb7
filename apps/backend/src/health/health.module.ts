import { Module } from '@nestjs/common';
import { JudgmentModule } from '../judgment';
import { PromptsModule } from '../prompts/prompts.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [PromptsModule, JudgmentModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
