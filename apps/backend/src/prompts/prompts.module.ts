import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EmbeddingsModule } from '../embeddings';
import { PromptCorpusService } from './prompt-corpus.service';
import { PromptSeedService } from './prompt-seed.service';
import { PromptsController } from './prompts.controller';
import { RetrievalService } from './retrieval.service';

@Module({
  imports: [ConfigModule, EmbeddingsModule],
  controllers: [PromptsController],
  providers: [PromptCorpusService, RetrievalService, PromptSeedService],
  exports: [PromptCorpusService, RetrievalService],
})
export class PromptsModule {}
