export { EMBEDDING_PROVIDER, type EmbeddingProvider } from './embedding-provider.interface';
export { EmbeddingError } from './embedding.errors';
export { HashingEmbeddingProvider } from './hashing-embedding.provider';
export { HttpEmbeddingProvider } from './http-embedding.provider';
export { EmbeddingsModule, createEmbeddingProvider } from './embeddings.module';
