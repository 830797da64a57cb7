import { tokenizeWords } from '../text-metrics';
import type { EmbeddingProvider } from './embedding-provider.interface';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const fnv1a = (value: string): number => {
  let hash = FNV_OFFSET;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
};

/**
 * Feature-hashing embedder: lower-cased words hashed into a fixed number of
 * signed buckets, then L2-normalized. Deterministic and offline, so corpora
 * built with it are reproducible; semantic quality is bag-of-words level.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash';

  constructor(private readonly dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of tokenizeWords(text)) {
      const hash = fnv1a(word.toLowerCase());
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimensions] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }

  getDimensions(): number {
    return this.dimensions;
  }
}
