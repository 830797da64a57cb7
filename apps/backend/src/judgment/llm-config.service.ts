import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type LlmRuntimeConfig = {
  baseUrl: string;
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  maxAttempts: number;
  responseFormat?: 'json_object';
};

const toNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value?.trim() && Number.isFinite(parsed) ? parsed : fallback;
};

@Injectable()
export class LlmConfigService {
  private readonly config: LlmRuntimeConfig;

  constructor(configService: ConfigService) {
    const apiKey = configService.get<string>('LLM_API_KEY')?.trim();
    const responseFormat = (configService.get<string>('LLM_RESPONSE_FORMAT') || 'json_object').trim();
    this.config = Object.freeze({
      baseUrl: (configService.get<string>('LLM_BASE_URL') || '').trim(),
      apiKey: apiKey || undefined,
      model: (configService.get<string>('LLM_MODEL') || '').trim(),
      maxTokens: toNumber(configService.get<string>('LLM_MAX_TOKENS'), 800),
      temperature: toNumber(configService.get<string>('LLM_TEMPERATURE'), 0.2),
      timeoutMs: Math.max(1, toNumber(configService.get<string>('LLM_TIMEOUT_MS'), 20000)),
      maxAttempts: Math.max(1, Math.floor(toNumber(configService.get<string>('LLM_MAX_ATTEMPTS'), 2))),
      responseFormat: responseFormat === 'json_object' ? 'json_object' : undefined,
    });
  }

  getConfig(): LlmRuntimeConfig {
    return this.config;
  }

  isConfigured(): boolean {
    return Boolean(this.config.baseUrl && this.config.model);
  }
}
