import { parseRagConfig } from './rag.config';

describe('parseRagConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(parseRagConfig({})).toEqual({
      topK: 5,
      similarityThreshold: 0.7,
      chunkHistoryLimit: 10,
      augmentationVariantCount: 5,
      retrievalTimeoutMs: 5000,
      retrievalConcurrency: 4,
      promptTokenBudget: 6000,
      generationMaxTokens: 1024,
      generationMaxAttempts: 2,
      generationBackoffMs: 500,
      maxMessageLength: 2000,
    });
  });

  it('coerces numeric strings from the environment', () => {
    const config = parseRagConfig({ RAG_TOP_K: '8', RAG_SIMILARITY_THRESHOLD: '0.55' });
    expect(config.topK).toBe(8);
    expect(config.similarityThreshold).toBe(0.55);
  });

  it('rejects a threshold outside [0, 1]', () => {
    expect(() => parseRagConfig({ RAG_SIMILARITY_THRESHOLD: '1.5' })).toThrow(
      /Invalid RAG configuration: similarityThreshold/,
    );
  });
});
