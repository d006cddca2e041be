import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { GeminiService, classifyGenerationError } from './gemini.service';
import { GenerationFatalError, GenerationTransientError } from '../../utils/errors';
import { AbortedError } from '../../utils/async';

const mockGenerateContent = jest.fn();
const mockEmbedContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: { generateContent: mockGenerateContent, embedContent: mockEmbedContent },
  })),
}));

function withStatus(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('classifyGenerationError', () => {
  it.each([408, 429, 500, 502, 503, 504])('treats HTTP %i as transient', status => {
    const classified = classifyGenerationError(withStatus('upstream', status));
    expect(classified).toBeInstanceOf(GenerationTransientError);
    expect(classified.status).toBe(status);
  });

  it.each([400, 401, 403, 404])('treats HTTP %i as fatal', status => {
    expect(classifyGenerationError(withStatus('bad request', status))).toBeInstanceOf(GenerationFatalError);
  });

  it('treats network failures as transient', () => {
    expect(classifyGenerationError(new TypeError('fetch failed'))).toBeInstanceOf(GenerationTransientError);
  });

  it('treats unknown failures as fatal', () => {
    expect(classifyGenerationError(new Error('unexpected shape'))).toBeInstanceOf(GenerationFatalError);
  });
});

describe('GeminiService', () => {
  let service: GeminiService;

  beforeEach(async () => {
    mockGenerateContent.mockReset();
    mockEmbedContent.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GeminiService,
        { provide: ConfigService, useValue: new ConfigService({ GEMINI_API_KEY: 'test-key', GEMINI_CHAT_MODEL: 'test-model' }) },
      ],
    }).compile();

    service = module.get<GeminiService>(GeminiService);
  });

  it('maps text, usage and log-probabilities into a generation result', async () => {
    mockGenerateContent.mockResolvedValue({
      text: 'Revenue grew 12% [Source 1].',
      usageMetadata: { totalTokenCount: 321 },
      candidates: [{ avgLogprobs: Math.log(0.8) }],
    });

    const result = await service.generate('prompt', 256);

    expect(result.text).toBe('Revenue grew 12% [Source 1].');
    expect(result.tokenCount).toBe(321);
    expect(result.certainty).toBeCloseTo(0.8, 10);
    expect(mockGenerateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'test-model',
        contents: [{ role: 'user', parts: [{ text: 'prompt' }] }],
        config: expect.objectContaining({ maxOutputTokens: 256 }),
      }),
    );
  });

  it('estimates tokens when usage metadata is missing', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'abcd' });

    const result = await service.generate('abcd', 64);

    expect(result.tokenCount).toBe(2);
    expect(result.certainty).toBeUndefined();
  });

  it('raises a fatal error when the prompt is blocked', async () => {
    mockGenerateContent.mockResolvedValue({ promptFeedback: { blockReason: 'SAFETY' } });
    await expect(service.generate('prompt', 64)).rejects.toBeInstanceOf(GenerationFatalError);
  });

  it('classifies SDK errors', async () => {
    mockGenerateContent.mockRejectedValue(withStatus('quota exceeded', 429));
    await expect(service.generate('prompt', 64)).rejects.toBeInstanceOf(GenerationTransientError);
  });

  it('reports cancellation instead of a generation failure', async () => {
    const controller = new AbortController();
    controller.abort();
    mockGenerateContent.mockRejectedValue(withStatus('aborted', 500));
    await expect(service.generate('prompt', 64, controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });

  it('returns embedding vectors in order', async () => {
    mockEmbedContent.mockResolvedValue({ embeddings: [{ values: [0.1, 0.2] }, { values: [0.3, 0.4] }] });
    await expect(service.embedTexts(['a', 'b'])).resolves.toEqual([
      [0.1, 0.2],
      [0.3, 0.4],
    ]);
  });
});
