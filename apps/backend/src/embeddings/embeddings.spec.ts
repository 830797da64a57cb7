import { ConfigService } from '@nestjs/config';
import { cosineSimilarity } from '../prompts/similarity';
import { EmbeddingError } from './embedding.errors';
import { createEmbeddingProvider } from './embeddings.module';
import { HashingEmbeddingProvider } from './hashing-embedding.provider';
import { HttpEmbeddingProvider } from './http-embedding.provider';

const configOf = (values: Record<string, string>) =>
  ({ get: jest.fn((key: string) => values[key]) }) as unknown as jest.Mocked<ConfigService>;

describe('HashingEmbeddingProvider', () => {
  const provider = new HashingEmbeddingProvider(64);

  it('should produce unit vectors of the configured dimension', () => {
    const vector = provider.embedSync('Write about your favourite school subject');

    expect(vector).toHaveLength(64);
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('should ignore case and be deterministic', async () => {
    await expect(provider.embed('School Life')).resolves.toEqual(provider.embedSync('school life'));
  });

  it('should return a zero vector for text without words', () => {
    expect(provider.embedSync('... !!!')).toEqual(new Array(64).fill(0));
  });

  it('should rank overlapping texts above unrelated ones', () => {
    const query = provider.embedSync('technology in school');
    const related = provider.embedSync('technology changes school life');
    const unrelated = provider.embedSync('my grandmother bakes bread');

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('should reject a non-positive dimension', () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow(RangeError);
  });
});

describe('HttpEmbeddingProvider', () => {
  let fetchMock: jest.SpyInstance;
  const provider = new HttpEmbeddingProvider({
    baseUrl: 'http://embeddings.test/v1/',
    apiKey: 'test-secret',
    model: 'test-embedding',
    dimensions: 3,
    timeoutMs: 1000,
  });

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should post the text and return the vector', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ data: [{ embedding: [0.1, 0.2, 0.3] }] }), { status: 200 }),
    );

    await expect(provider.embed('hello')).resolves.toEqual([0.1, 0.2, 0.3]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://embeddings.test/v1/embeddings');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(init.body)).toEqual({ model: 'test-embedding', input: 'hello', dimensions: 3 });
  });

  it('should reject a vector of the wrong size', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ data: [{ embedding: [0.1, 0.2] }] }), { status: 200 }),
    );

    await expect(provider.embed('hello')).rejects.toThrow(
      'Embedding has 2 dimensions, expected 3',
    );
  });

  it.each([
    ['a non-JSON body', '<html>gateway</html>'],
    ['a null body', 'null'],
    ['a body without vectors', '{"data":[]}'],
  ])('should raise EmbeddingError for %s', async (_case, body) => {
    fetchMock.mockResolvedValueOnce(new Response(body, { status: 200 }));

    await expect(provider.embed('hello')).rejects.toBeInstanceOf(EmbeddingError);
  });

  it('should raise EmbeddingError when the body stalls past the deadline', async () => {
    const slow = new HttpEmbeddingProvider({
      baseUrl: 'http://embeddings.test/v1',
      model: 'test-embedding',
      dimensions: 3,
      timeoutMs: 20,
    });
    fetchMock.mockResolvedValueOnce(new Response(new ReadableStream({ start() {} }), { status: 200 }));

    await expect(slow.embed('hello')).rejects.toThrow('Request timed out after 20ms');
  });

  it('should wrap API and network failures in EmbeddingError', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('overloaded', { status: 503 }))
      .mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(provider.embed('hello')).rejects.toBeInstanceOf(EmbeddingError);
    await expect(provider.embed('hello')).rejects.toMatchObject({ statusCode: 502 });
  });
});

describe('createEmbeddingProvider', () => {
  it('should default to the hashing embedder with 256 dimensions', () => {
    const provider = createEmbeddingProvider(configOf({}));

    expect(provider).toBeInstanceOf(HashingEmbeddingProvider);
    expect(provider.getDimensions()).toBe(256);
  });

  it('should build the HTTP provider when asked', () => {
    const provider = createEmbeddingProvider(
      configOf({ EMBEDDING_PROVIDER: 'HTTP', EMBEDDING_DIMENSIONS: '8' }),
    );

    expect(provider).toBeInstanceOf(HttpEmbeddingProvider);
    expect(provider.getDimensions()).toBe(8);
  });
});
