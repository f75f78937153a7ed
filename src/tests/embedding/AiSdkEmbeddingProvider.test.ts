import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AiSdkEmbeddingProvider, OLLAMA_DEFAULT_BASE_URL } from '../../embedding/providers/AiSdkEmbeddingProvider.js';

const { embedManyMock, createOpenAIMock, textEmbeddingModelMock } = vi.hoisted(() => {
  const textEmbeddingModelMock = vi.fn((modelId: string) => ({ modelId }));
  return {
    embedManyMock: vi.fn(),
    textEmbeddingModelMock,
    createOpenAIMock: vi.fn(() => ({ textEmbeddingModel: textEmbeddingModelMock }))
  };
});

vi.mock('ai', () => ({ embedMany: embedManyMock }));
vi.mock('@ai-sdk/openai', () => ({ createOpenAI: createOpenAIMock }));

describe('AiSdkEmbeddingProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should embed through embedMany with SDK retries off', async () => {
    embedManyMock.mockResolvedValue({ embeddings: [[0.1, 0.2], [0.3, 0.4]] });
    const provider = new AiSdkEmbeddingProvider({
      provider: 'openai',
      model: 'text-embedding-3-small',
      dimension: 2,
      apiKey: 'test-secret'
    });
    const controller = new AbortController();

    const vectors = await provider.embed(['a', 'b'], { signal: controller.signal });

    expect(vectors).toEqual([[0.1, 0.2], [0.3, 0.4]]);
    expect(createOpenAIMock).toHaveBeenCalledWith({ baseURL: undefined, apiKey: 'test-secret' });
    expect(textEmbeddingModelMock).toHaveBeenCalledWith('text-embedding-3-small');
    expect(embedManyMock).toHaveBeenCalledWith({
      model: { modelId: 'text-embedding-3-small' },
      values: ['a', 'b'],
      maxRetries: 0,
      abortSignal: controller.signal,
      providerOptions: { openai: { dimensions: 2 } }
    });
  });

  it('should point ollama at its OpenAI-compatible endpoint', async () => {
    embedManyMock.mockResolvedValue({ embeddings: [[1, 0, 0]] });
    const provider = new AiSdkEmbeddingProvider({ provider: 'ollama', model: 'nomic-embed-text', dimension: 3 });

    await provider.embed(['x']);

    expect(createOpenAIMock).toHaveBeenCalledWith({ baseURL: OLLAMA_DEFAULT_BASE_URL, apiKey: 'ollama' });
    expect(embedManyMock).toHaveBeenCalledWith(expect.objectContaining({ providerOptions: undefined }));
  });

  it('should not call the SDK for an empty list', async () => {
    const provider = new AiSdkEmbeddingProvider({ provider: 'openai', model: 'text-embedding-ada-002', dimension: 4 });

    await expect(provider.embed([])).resolves.toEqual([]);
    expect(embedManyMock).not.toHaveBeenCalled();
  });
});
