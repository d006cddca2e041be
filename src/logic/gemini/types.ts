export interface GenerationResult {
    text: string;
    tokenCount: number;
    /** exp(average token log-probability) when the backend reports it. */
    certainty?: number;
}

export interface GenerationService {
    readonly modelName: string;
    /** Rejects with GenerationTransientError (retryable) or GenerationFatalError. */
    generate(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<GenerationResult>;
}

export interface EmbeddingService {
    embedTexts(texts: string[]): Promise<number[][]>;
}

export const GENERATION_SERVICE = Symbol('GENERATION_SERVICE');
export const EMBEDDING_SERVICE = Symbol('EMBEDDING_SERVICE');
