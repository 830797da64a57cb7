import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { JUDGMENT_CLIENT } from './judgment-client.interface';
import { LlmConfigService } from './llm-config.service';
import { LlmJudgmentClient } from './llm-judgment.client';

@Module({
  imports: [ConfigModule],
  providers: [
    LlmConfigService,
    LlmJudgmentClient,
    { provide: JUDGMENT_CLIENT, useExisting: LlmJudgmentClient },
  ],
  exports: [JUDGMENT_CLIENT, LlmConfigService],
})
export class JudgmentModule {}
