export const EMBEDDING_PROVIDER = Symbol('EMBEDDING_PROVIDER');

export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  getDimensions(): number;
}
