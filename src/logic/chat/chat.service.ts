import { HttpException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ragConfig } from '../../config/rag.config';
import { AccessScopeService } from '../access-scope/access-scope.service';
import { CONVERSATION_STORE, ConversationStore } from '../chat-memory/types';
import { ConversationContextService } from '../chat-memory/context.service';
import { boundHistory } from '../chat-memory/history';
import { QueryAugmentationService } from '../query-augmentation/query-augmentation.service';
import { RetrieverService } from '../retrieval/retriever.service';
import { RankerService } from '../retrieval/ranker';
import { RetrievalQuery } from '../retrieval/types';
import { PromptComposerService } from '../prompt/prompt-composer.service';
import { ResponsePostProcessorService } from '../post-processor/response-post-processor.service';
import { GENERATION_SERVICE, GenerationResult, GenerationService } from '../gemini/types';
import { classifyGenerationError } from '../gemini/gemini.service';
import { GenerationTransientError, FatalPipelineError, PipelineCancelledError, PipelineStage, RagValidationError, errorMessage } from '../../utils/errors';
import { isAbortError, sleep } from '../../utils/async';
import { sanitizeMessage } from '../../utils/textNormalizer';
import { SubmitTurnDto, ValidTurnRequest, submitTurnSchema } from './dto/submit-turn.dto';
import { PipelineInfo, TurnResult, TurnWarning } from './types';

const STAGES: PipelineStage[] = [
    'validation',
    'contextualization',
    'augmentation',
    'retrieval',
    'ranking',
    'composition',
    'generation',
    'post-processing',
    'persistence',
];

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);

    constructor(
        @Inject(CONVERSATION_STORE)
        private readonly store: ConversationStore,
        @Inject(GENERATION_SERVICE)
        private readonly generator: GenerationService,
        @Inject(ragConfig.KEY)
        private readonly config: ConfigType<typeof ragConfig>,
        private readonly accessScopeService: AccessScopeService,
        private readonly contextService: ConversationContextService,
        private readonly augmentationService: QueryAugmentationService,
        private readonly retrieverService: RetrieverService,
        private readonly rankerService: RankerService,
        private readonly promptComposer: PromptComposerService,
        private readonly postProcessor: ResponsePostProcessorService,
    ) { }

    /**
     * Runs one chat turn through contextualization, augmentation, scoped retrieval,
     * ranking, composition, generation and post-processing, then stores the
     * user/assistant pair. Nothing is stored when a stage fails or `signal` fires.
     */
    async submitTurn(dto: SubmitTurnDto, signal?: AbortSignal): Promise<TurnResult> {
        const receivedAt = new Date();
        const request = this.validate(dto);
        const scope = this.accessScopeService.resolve(request.role);
        this.logger.log(`Turn from ${request.userId} (${request.role}): "${request.message.slice(0, 50)}"`);

        const conversationId = await this.stage('persistence', signal, () =>
            this.store.ensureConversation(request.userId, request.message, request.conversationId),
        );
        const limit = this.config.chunkHistoryLimit;
        const history = boundHistory(
            await this.stage('persistence', signal, () => this.store.loadHistory(conversationId, limit)),
            limit,
        );
        const warnings: TurnWarning[] = [];

        const standalone = await this.stage('contextualization', signal, () =>
            this.contextService.buildStandaloneQuery(history, request.message, signal),
        );
        if (standalone.degraded) {
            warnings.push({ code: 'CONTEXTUALIZATION_FAILED', message: 'Follow-up could not be rewritten; the raw message was used' });
        }

        const augmented = await this.stage('augmentation', signal, () =>
            this.augmentationService.augment(standalone.text, signal),
        );
        if (augmented.degraded) {
            warnings.push({ code: 'AUGMENTATION_FAILED', message: 'Query variants unavailable; searched with the original query only' });
        }

        const query: RetrievalQuery = { original: request.message, standalone: standalone.text, variants: augmented.variants };
        const outcome = await this.stage('retrieval', signal, () =>
            this.retrieverService.retrieve(query.variants, scope, signal),
        );
        if (outcome.failures.length > 0) {
            const collections = [...new Set(outcome.failures.map(f => f.collection))].join(', ');
            warnings.push({
                code: 'DEGRADED_RETRIEVAL',
                message: `${outcome.failures.length} of ${outcome.searches} searches failed (${collections}); results may be incomplete`,
            });
        }

        const ranked = await this.stage('ranking', signal, async () => this.rankerService.merge(outcome.hits, this.config.topK));
        if (ranked.chunks.length === 0) {
            warnings.push({ code: 'NO_CONTEXT_FOUND', message: `No document passed the similarity threshold of ${this.config.similarityThreshold}` });
        }

        const prompt = await this.stage('composition', signal, async () =>
            this.promptComposer.compose(query.standalone, ranked, history, scope),
        );
        if (prompt.droppedChunks > 0) {
            warnings.push({ code: 'PROMPT_TRUNCATED', message: `${prompt.droppedChunks} lowest-ranked sources were left out to fit the prompt budget` });
        }

        const generated = await this.stage('generation', signal, () => this.generateWithRetry(prompt.text, signal));
        const answer = await this.stage('post-processing', signal, async () => this.postProcessor.process(generated, prompt.chunks));

        this.checkpoint('persistence', signal);
        const answeredAt = new Date(Math.max(Date.now(), receivedAt.getTime() + 1));
        const messageId = await this.stage('persistence', undefined, async () => {
            await this.store.appendTurn(conversationId, {
                role: 'user',
                content: request.message,
                userId: request.userId,
                timestamp: receivedAt,
            });
            return this.store.appendTurn(conversationId, {
                role: 'assistant',
                content: answer.text,
                citations: answer.citations,
                confidence: answer.confidence,
                tokensUsed: answer.tokenCount,
                timestamp: answeredAt,
            });
        });

        const degraded = warnings.some(w => w.code !== 'NO_CONTEXT_FOUND' && w.code !== 'PROMPT_TRUNCATED');
        this.logger.log(
            `Answered in ${conversationId}: ${prompt.chunks.length} sources, confidence ${answer.confidence}${degraded ? ' (degraded)' : ''}`,
        );

        return {
            conversationId,
            messageId,
            answer: answer.text,
            sources: request.includeSources ? answer.citations : [],
            citedExplicitly: answer.citedExplicitly,
            confidence: answer.confidence,
            tokensUsed: answer.tokenCount,
            degraded,
            warnings,
            timestamp: answeredAt,
        };
    }

    getPipelineInfo(): PipelineInfo {
        return {
            model: this.generator.modelName,
            stages: [...STAGES],
            topK: this.config.topK,
            similarityThreshold: this.config.similarityThreshold,
            chunkHistoryLimit: this.config.chunkHistoryLimit,
            augmentationVariantCount: this.config.augmentationVariantCount,
            retrievalTimeoutMs: this.config.retrievalTimeoutMs,
            retrievalConcurrency: this.config.retrievalConcurrency,
            promptTokenBudget: this.config.promptTokenBudget,
            generationMaxAttempts: this.config.generationMaxAttempts,
        };
    }

    private validate(dto: SubmitTurnDto): ValidTurnRequest {
        const parsed = submitTurnSchema.safeParse(dto);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            throw new RagValidationError('Invalid turn request', issues);
        }
        const message = sanitizeMessage(parsed.data.message);
        if (!message) {
            throw new RagValidationError('Message cannot be empty');
        }
        if (message.length > this.config.maxMessageLength) {
            throw new RagValidationError(`Message too long (max ${this.config.maxMessageLength} characters)`);
        }
        return { ...parsed.data, message };
    }

    private async generateWithRetry(prompt: string, signal?: AbortSignal): Promise<GenerationResult> {
        const maxAttempts = this.config.generationMaxAttempts;
        for (let attempt = 1; ; attempt++) {
            try {
                return await this.generator.generate(prompt, this.config.generationMaxTokens, signal);
            } catch (error) {
                if (signal?.aborted || isAbortError(error)) {
                    throw error;
                }
                const classified = classifyGenerationError(error);
                if (classified instanceof GenerationTransientError && attempt < maxAttempts) {
                    const delay = this.config.generationBackoffMs * 2 ** (attempt - 1);
                    this.logger.warn(`Generation attempt ${attempt} failed (${classified.message}); retrying in ${delay}ms`);
                    await sleep(delay, signal);
                    continue;
                }
                this.logger.error(`Generation failed after ${attempt} attempt(s): ${classified.message}`);
                throw new FatalPipelineError('generation', classified.message, classified);
            }
        }
    }

    private checkpoint(stage: PipelineStage, signal?: AbortSignal): void {
        if (signal?.aborted) {
            this.logger.warn(`Turn cancelled before ${stage}`);
            throw new PipelineCancelledError(stage);
        }
    }

    /** Runs one stage, turning cancellation and unexpected failures into pipeline errors. */
    private async stage<T>(stage: PipelineStage, signal: AbortSignal | undefined, run: () => Promise<T>): Promise<T> {
        this.checkpoint(stage, signal);
        try {
            return await run();
        } catch (error) {
            if (signal?.aborted || isAbortError(error)) {
                this.logger.warn(`Turn cancelled during ${stage}`);
                throw new PipelineCancelledError(stage);
            }
            if (error instanceof HttpException) {
                throw error;
            }
            this.logger.error(`Stage ${stage} failed: ${errorMessage(error)}`);
            throw new FatalPipelineError(stage, errorMessage(error), error);
        }
    }
}
