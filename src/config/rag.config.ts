import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const ragConfigSchema = z.object({
    topK: z.coerce.number().int().min(1).default(5),
    similarityThreshold: z.coerce.number().min(0).max(1).default(0.7),
    chunkHistoryLimit: z.coerce.number().int().min(0).default(10),
    augmentationVariantCount: z.coerce.number().int().min(1).default(5),
    retrievalTimeoutMs: z.coerce.number().int().positive().default(5000),
    retrievalConcurrency: z.coerce.number().int().min(1).default(4),
    promptTokenBudget: z.coerce.number().int().positive().default(6000),
    generationMaxTokens: z.coerce.number().int().positive().default(1024),
    generationMaxAttempts: z.coerce.number().int().min(1).max(5).default(2),
    generationBackoffMs: z.coerce.number().int().min(0).default(500),
    maxMessageLength: z.coerce.number().int().positive().default(2000),
});

export type RagConfig = z.infer<typeof ragConfigSchema>;

export function parseRagConfig(env: NodeJS.ProcessEnv): RagConfig {
    const result = ragConfigSchema.safeParse({
        topK: env.RAG_TOP_K,
        similarityThreshold: env.RAG_SIMILARITY_THRESHOLD,
        chunkHistoryLimit: env.RAG_CHUNK_HISTORY_LIMIT,
        augmentationVariantCount: env.RAG_AUGMENTATION_VARIANT_COUNT,
        retrievalTimeoutMs: env.RAG_RETRIEVAL_TIMEOUT_MS,
        retrievalConcurrency: env.RAG_RETRIEVAL_CONCURRENCY,
        promptTokenBudget: env.RAG_PROMPT_TOKEN_BUDGET,
        generationMaxTokens: env.RAG_GENERATION_MAX_TOKENS,
        generationMaxAttempts: env.RAG_GENERATION_MAX_ATTEMPTS,
        generationBackoffMs: env.RAG_GENERATION_BACKOFF_MS,
        maxMessageLength: env.RAG_MAX_MESSAGE_LENGTH,
    });
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid RAG configuration: ${issues}`);
    }
    return result.data;
}

export const ragConfig = registerAs('rag', () => parseRagConfig(process.env));
