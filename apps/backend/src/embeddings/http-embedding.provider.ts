import { Logger } from '@nestjs/common';
import { FetchAbortedError, FetchTimeoutError, fetchWithTimeout } from '../common/http/fetch-with-timeout';
import type { EmbeddingProvider } from './embedding-provider.interface';
import { EmbeddingError } from './embedding.errors';

export type HttpEmbeddingOptions = {
  baseUrl: string;
  apiKey?: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
};

type EmbeddingResponse = {
  data?: Array<{ embedding?: unknown }>;
};

/**
 * OpenAI-compatible `/embeddings` client. The declared dimension is enforced
 * on every response so a model swap cannot silently mix vector sizes.
 */
export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'http';
  private readonly logger = new Logger(HttpEmbeddingProvider.name);

  constructor(private readonly options: HttpEmbeddingOptions) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const url = `${this.options.baseUrl.replace(/\/$/, '')}/embeddings`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let response: { ok: boolean; status: number; text: string };
    try {
      response = await fetchWithTimeout(
        url,
        {
          method: 'POST',
          headers,
          body: JSON.stringify({
            model: this.options.model,
            input: text,
            dimensions: this.options.dimensions,
          }),
        },
        this.options.timeoutMs,
        async (res) => ({ ok: res.ok, status: res.status, text: await res.text() }),
        signal,
      );
    } catch (error) {
      if (error instanceof FetchTimeoutError || error instanceof FetchAbortedError) {
        throw new EmbeddingError(error.message, { cause: error });
      }
      throw new EmbeddingError('Embedding request failed', { cause: error });
    }

    if (!response.ok) {
      this.logger.warn(`Embedding API error: ${response.status} ${response.text.slice(0, 200)}`);
      throw new EmbeddingError(`Embedding API error: ${response.status}`);
    }

    const embedding = this.extractEmbedding(response.text);
    if (embedding.length !== this.options.dimensions) {
      throw new EmbeddingError(
        `Embedding has ${embedding.length} dimensions, expected ${this.options.dimensions}`,
      );
    }
    return embedding;
  }

  private extractEmbedding(body: string): number[] {
    let data: EmbeddingResponse | null;
    try {
      data = JSON.parse(body) as EmbeddingResponse | null;
    } catch (error) {
      throw new EmbeddingError('Embedding response is not JSON', { cause: error });
    }
    const embedding = data?.data?.[0]?.embedding;
    if (!Array.isArray(embedding) || !embedding.every((value) => typeof value === 'number')) {
      throw new EmbeddingError('Embedding response missing vector');
    }
    return embedding;
  }

  getDimensions(): number {
    return this.options.dimensions;
  }
}
