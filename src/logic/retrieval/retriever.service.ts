import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ragConfig } from '../../config/rag.config';
import { AccessScope, CollectionId } from '../access-scope/types';
import { inScope, parseCollectionTag } from '../access-scope/access-scope.service';
import { AbortedError, TimeoutError, runWithConcurrency, withTimeout } from '../../utils/async';
import { errorMessage } from '../../utils/errors';
import { RawHit, RetrievalFailure, RetrievalOutcome, VECTOR_INDEX, VectorIndex, VectorMatch, chunkKey } from './types';

interface SearchTask {
    variant: string;
    variantIndex: number;
    collection: CollectionId;
}

type SearchResult = { hits: RawHit[] } | { failure: RetrievalFailure };

@Injectable()
export class RetrieverService {
    private readonly logger = new Logger(RetrieverService.name);

    constructor(
        @Inject(VECTOR_INDEX)
        private readonly index: VectorIndex,
        @Inject(ragConfig.KEY)
        private readonly config: ConfigType<typeof ragConfig>,
    ) { }

    /**
     * Searches every variant against every collection in `scope`. A failed or
     * timed-out search contributes no hits and is reported in `failures`.
     */
    async retrieve(variants: readonly string[], scope: AccessScope, signal?: AbortSignal): Promise<RetrievalOutcome> {
        const tasks: SearchTask[] = variants.flatMap((variant, variantIndex) =>
            scope.collections.map(collection => ({ variant, variantIndex, collection })),
        );

        const results = await runWithConcurrency(tasks, this.config.retrievalConcurrency, task =>
            this.search(task, scope, signal),
        );

        const hits: RawHit[] = [];
        const failures: RetrievalFailure[] = [];
        for (const result of results) {
            if ('failure' in result) {
                failures.push(result.failure);
            } else {
                hits.push(...result.hits);
            }
        }

        if (failures.length > 0) {
            this.logger.warn(`${failures.length} of ${tasks.length} searches failed; continuing with partial results`);
        }
        this.logger.log(`Retrieved ${hits.length} hits above threshold from ${tasks.length} searches`);
        return { hits, failures, searches: tasks.length };
    }

    private async search(task: SearchTask, scope: AccessScope, signal?: AbortSignal): Promise<SearchResult> {
        const { variant, variantIndex, collection } = task;
        let matches: VectorMatch[];
        try {
            matches = await withTimeout(
                taskSignal => this.index.similaritySearch(collection, variant, this.config.topK, taskSignal),
                this.config.retrievalTimeoutMs,
                { parent: signal, context: `search ${collection} variant ${variantIndex}` },
            );
        } catch (error) {
            if (error instanceof AbortedError || signal?.aborted) {
                throw error instanceof AbortedError ? error : new AbortedError();
            }
            const timedOut = error instanceof TimeoutError;
            this.logger.warn(`Skipping ${collection} for variant ${variantIndex}: ${errorMessage(error)}`);
            return { failure: { collection, variantIndex, reason: errorMessage(error), timedOut } };
        }

        const hits: RawHit[] = [];
        for (const match of matches) {
            if (!Number.isFinite(match.score) || match.score < 0 || match.score > 1) {
                this.logger.warn(`Dropping ${chunkKey(match.chunkId)}: score ${match.score} is outside [0, 1]`);
                continue;
            }
            if (match.score < this.config.similarityThreshold) continue;
            const tag = match.metadata.collection;
            if (tag !== undefined) {
                const recorded = parseCollectionTag(tag);
                if (recorded === null || recorded !== collection || !inScope(scope, recorded)) {
                    this.logger.warn(`Dropping ${chunkKey(match.chunkId)}: tagged ${tag}, searched ${collection}`);
                    continue;
                }
            }
            hits.push({
                variantIndex,
                chunk: {
                    id: match.chunkId,
                    key: chunkKey(match.chunkId),
                    collection,
                    text: match.text,
                    score: match.score,
                    metadata: match.metadata,
                },
            });
        }
        return { hits };
    }
}
