import { Citation } from '../post-processor/types';

export type TurnWarningCode =
    | 'CONTEXTUALIZATION_FAILED'
    | 'AUGMENTATION_FAILED'
    | 'DEGRADED_RETRIEVAL'
    | 'NO_CONTEXT_FOUND'
    | 'PROMPT_TRUNCATED';

export interface TurnWarning {
    code: TurnWarningCode;
    message: string;
}

export interface TurnResult {
    conversationId: string;
    messageId: string;
    answer: string;
    /** Empty when the request set includeSources to false. */
    sources: Citation[];
    citedExplicitly: boolean;
    confidence: number;
    tokensUsed: number;
    /** True when a stage fell back to a reduced result; NO_CONTEXT_FOUND alone does not set it. */
    degraded: boolean;
    warnings: TurnWarning[];
    timestamp: Date;
}

export interface PipelineInfo {
    model: string;
    stages: string[];
    topK: number;
    similarityThreshold: number;
    chunkHistoryLimit: number;
    augmentationVariantCount: number;
    retrievalTimeoutMs: number;
    retrievalConcurrency: number;
    promptTokenBudget: number;
    generationMaxAttempts: number;
}
