/**
 * Tests for Embedding Service
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockEmbeddingsCreate = vi.fn();
const mockConstructorCalls: Array<{ apiKey: string }> = [];

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = { create: mockEmbeddingsCreate };
      constructor(config: { apiKey: string }) {
        mockConstructorCalls.push(config);
      }
    },
  };
});

import {
  EmbeddingService,
  createEmbeddingService,
  DEFAULT_EMBEDDING_MODEL,
  EMBEDDING_DIMENSIONS,
} from '../embeddings';

function embeddingsResponse(vectors: number[][], tokens = 4, shuffled = false) {
  const data = vectors.map((embedding, index) => ({ embedding, index }));
  return {
    data: shuffled ? [...data].reverse() : data,
    usage: { total_tokens: tokens },
  };
}

describe('Embedding Constants', () => {
  it('should default to the small model', () => {
    expect(DEFAULT_EMBEDDING_MODEL).toBe('text-embedding-3-small');
    expect(EMBEDDING_DIMENSIONS).toBe(1536);
  });
});

describe('EmbeddingService', () => {
  beforeEach(() => {
    mockEmbeddingsCreate.mockReset();
    mockConstructorCalls.length = 0;
  });

  it('should create the client with the API key', () => {
    new EmbeddingService('test-api-key');

    expect(mockConstructorCalls).toEqual([{ apiKey: 'test-api-key' }]);
  });

  it('should request the default model and dimensions', async () => {
    mockEmbeddingsCreate.mockResolvedValueOnce(embeddingsResponse([[0.1, 0.2]], 3));
    const service = new EmbeddingService('test-key');

    const result = await service.embedBatch(['hello']);

    expect(result).toEqual({ embeddings: [[0.1, 0.2]], totalTokens: 3 });
    expect(mockEmbeddingsCreate).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: ['hello'],
      dimensions: 1536,
    });
  });

  it('should pass a custom model and dimensions to the API', async () => {
    mockEmbeddingsCreate.mockResolvedValueOnce(embeddingsResponse([[0.5]], 1));
    const service = new EmbeddingService('test-key', { model: 'custom-embedder', dimensions: 256 });

    await service.embedBatch(['hello']);

    expect(mockEmbeddingsCreate).toHaveBeenCalledWith({ model: 'custom-embedder', input: ['hello'], dimensions: 256 });
  });

  it('should restore input order from response indices', async () => {
    mockEmbeddingsCreate.mockResolvedValueOnce(embeddingsResponse([[1], [2], [3]], 6, true));
    const service = new EmbeddingService('test-key');

    const result = await service.embedBatch(['a', 'b', 'c']);

    expect(result).toEqual({ embeddings: [[1], [2], [3]], totalTokens: 6 });
  });

  it('should split large inputs into batches', async () => {
    mockEmbeddingsCreate
      .mockResolvedValueOnce(embeddingsResponse([[1], [2]], 2))
      .mockResolvedValueOnce(embeddingsResponse([[3]], 1));
    const service = new EmbeddingService('test-key', { batchSize: 2 });

    const result = await service.embedBatch(['a', 'b', 'c']);

    expect(mockEmbeddingsCreate).toHaveBeenCalledTimes(2);
    expect(mockEmbeddingsCreate.mock.calls[1][0]).toMatchObject({ input: ['c'] });
    expect(result).toEqual({ embeddings: [[1], [2], [3]], totalTokens: 3 });
  });

  it('should reject empty texts before calling the API', async () => {
    const service = new EmbeddingService('test-key');

    await expect(service.embedBatch(['ok', '   '])).rejects.toThrow('Cannot generate embedding for empty text');
    expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
  });

  it('should return nothing for no texts', async () => {
    const service = new EmbeddingService('test-key');

    expect(await service.embedBatch([])).toEqual({ embeddings: [], totalTokens: 0 });
    expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
  });

  it('should propagate API errors', async () => {
    mockEmbeddingsCreate.mockRejectedValueOnce(new Error('rate limited'));
    const service = new EmbeddingService('test-key');

    await expect(service.embedBatch(['hello'])).rejects.toThrow('rate limited');
  });
});

describe('createEmbeddingService', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  beforeEach(() => {
    mockConstructorCalls.length = 0;
  });

  it('should prefer an explicit key', () => {
    createEmbeddingService('explicit-key');
    expect(mockConstructorCalls).toEqual([{ apiKey: 'explicit-key' }]);
  });

  it('should fall back to OPENAI_API_KEY', () => {
    vi.stubEnv('OPENAI_API_KEY', 'env-key');

    createEmbeddingService();

    expect(mockConstructorCalls).toEqual([{ apiKey: 'env-key' }]);
  });

  it('should throw without any key', () => {
    vi.stubEnv('OPENAI_API_KEY', '');

    expect(() => createEmbeddingService()).toThrow('No OpenAI API key provided and OPENAI_API_KEY not set');
  });
});
