import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EMBEDDING_PROVIDER, type EmbeddingProvider } from './embedding-provider.interface';
import { HashingEmbeddingProvider } from './hashing-embedding.provider';
import { HttpEmbeddingProvider } from './http-embedding.provider';

export const createEmbeddingProvider = (config: ConfigService): EmbeddingProvider => {
  const kind = (config.get<string>('EMBEDDING_PROVIDER') || 'hash').toLowerCase();
  const dimensions = Number(config.get<string>('EMBEDDING_DIMENSIONS') || (kind === 'http' ? '1536' : '256'));

  if (kind === 'http') {
    return new HttpEmbeddingProvider({
      baseUrl: config.get<string>('EMBEDDING_BASE_URL') || 'https://api.openai.com/v1',
      apiKey: config.get<string>('EMBEDDING_API_KEY') || config.get<string>('LLM_API_KEY') || undefined,
      model: config.get<string>('EMBEDDING_MODEL') || 'text-embedding-3-small',
      dimensions,
      timeoutMs: Number(config.get<string>('LLM_TIMEOUT_MS') || '20000'),
    });
  }

  if (kind !== 'hash') {
    Logger.warn(`Unknown EMBEDDING_PROVIDER "${kind}", falling back to hash`, 'EmbeddingsModule');
  }
  return new HashingEmbeddingProvider(dimensions);
};

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: EMBEDDING_PROVIDER,
      inject: [ConfigService],
      useFactory: createEmbeddingProvider,
    },
  ],
  exports: [EMBEDDING_PROVIDER],
})
export class EmbeddingsModule {}
