import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { EmbeddingService, GenerationResult, GenerationService } from './types';
import {
    GenerationFatalError,
    GenerationTransientError,
    errorMessage,
    errorStatus,
    isTransientStatus,
} from '../../utils/errors';
import { AbortedError, isAbortError } from '../../utils/async';
import { estimateTokens } from '../../utils/textNormalizer';

const NETWORK_FAILURE = /fetch failed|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up/i;

export function classifyGenerationError(error: unknown): GenerationTransientError | GenerationFatalError {
    if (error instanceof GenerationTransientError || error instanceof GenerationFatalError) {
        return error;
    }
    const message = errorMessage(error);
    const status = errorStatus(error);
    if (status !== undefined) {
        return isTransientStatus(status)
            ? new GenerationTransientError(message, status, { cause: error })
            : new GenerationFatalError(message, status, { cause: error });
    }
    if ((error instanceof Error && error.name === 'TimeoutError') || NETWORK_FAILURE.test(message)) {
        return new GenerationTransientError(message, undefined, { cause: error });
    }
    return new GenerationFatalError(message, undefined, { cause: error });
}

@Injectable()
export class GeminiService implements GenerationService, EmbeddingService {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly embedModel: string;
    private readonly chatModel: string;
    private readonly temperature: number;

    constructor(private readonly configService: ConfigService) {
        this.embedModel = this.configService.get<string>('GEMINI_EMBED_MODEL') || 'text-embedding-004';
        this.chatModel = this.configService.get<string>('GEMINI_CHAT_MODEL') || 'gemini-2.5-flash-lite';
        this.temperature = Number(this.configService.get<string>('GEMINI_TEMPERATURE') ?? 0.3);
        this.genAI = new GoogleGenAI({ apiKey: this.configService.get<string>('GEMINI_API_KEY') || '' });
    }

    get modelName(): string {
        return this.chatModel;
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        try {
            const result = await this.genAI.models.embedContent({ contents: texts, model: this.embedModel });
            return (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
        } catch (error) {
            this.logger.error(`Error generating embeddings: ${errorMessage(error)}`);
            throw classifyGenerationError(error);
        }
    }

    async generate(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<GenerationResult> {
        const result = await this.request(prompt, maxTokens, signal);

        const blockReason = result.promptFeedback?.blockReason;
        if (blockReason) {
            throw new GenerationFatalError(`Prompt blocked by the model: ${blockReason}`);
        }

        const text = result.text ?? '';
        const avgLogprobs = result.candidates?.[0]?.avgLogprobs;
        return {
            text,
            tokenCount: result.usageMetadata?.totalTokenCount ?? estimateTokens(prompt + text),
            certainty: typeof avgLogprobs === 'number' ? Math.min(1, Math.exp(avgLogprobs)) : undefined,
        };
    }

    private async request(prompt: string, maxTokens: number, signal?: AbortSignal) {
        try {
            return await this.genAI.models.generateContent({
                model: this.chatModel,
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                config: { temperature: this.temperature, maxOutputTokens: maxTokens, abortSignal: signal },
            });
        } catch (error) {
            if (signal?.aborted || isAbortError(error)) {
                throw new AbortedError('Generation aborted');
            }
            const classified = classifyGenerationError(error);
            this.logger.warn(`Generation failed (${classified.name}): ${classified.message}`);
            throw classified;
        }
    }
}
