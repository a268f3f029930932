import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OpenAICompatibleEmbeddingModel } from '../embeddings';
import { ProviderError } from '../../utils/errors';

const embeddingResponse = (data: Array<{ index: number; embedding: unknown }>): Response =>
  new Response(JSON.stringify({ data }), { status: 200 });

describe('OpenAICompatibleEmbeddingModel', () => {
  let originalFetch: typeof global.fetch;
  const model = new OpenAICompatibleEmbeddingModel({
    baseUrl: 'http://localhost:11434/v1',
    apiKey: '',
    model: 'all-minilm',
    dimensions: 3,
    timeout: 5000,
  });

  beforeEach(() => {
    originalFetch = global.fetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('should post texts and return vectors in input order', async () => {
    const fetchMock = vi.fn<typeof fetch>(() =>
      Promise.resolve(
        embeddingResponse([
          { index: 1, embedding: [0, 1, 0] },
          { index: 0, embedding: [1, 0, 0] },
        ])
      )
    );
    global.fetch = fetchMock;

    await expect(model.embed(['first', 'second'])).resolves.toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/v1/embeddings');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'all-minilm',
      input: ['first', 'second'],
      dimensions: 3,
    });
  });

  it('should reject a response with the wrong number of vectors', async () => {
    global.fetch = vi.fn<typeof fetch>(() =>
      Promise.resolve(embeddingResponse([{ index: 0, embedding: [1, 0, 0] }]))
    );

    await expect(model.embed(['a', 'b'])).rejects.toBeInstanceOf(ProviderError);
  });

  it('should reject non-numeric vectors', async () => {
    global.fetch = vi.fn<typeof fetch>(() =>
      Promise.resolve(embeddingResponse([{ index: 0, embedding: 'nope' }]))
    );

    await expect(model.embed(['a'])).rejects.toThrow(
      'Embedding response from all-minilm is missing vectors'
    );
  });
});
