import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ElasticRequestError, ElasticService } from './elastic.service';
import { EMBEDDING_SERVICE, EmbeddingService } from '../gemini/types';
import { CollectionId } from '../access-scope/types';
import { VectorIndex, VectorMatch } from '../retrieval/types';

const knnResponseSchema = z.object({
    hits: z.object({
        hits: z.array(z.object({
            _id: z.string(),
            _score: z.number().nullable().optional(),
            _source: z.object({
                doc_id: z.string(),
                chunk_index: z.number().int(),
                title: z.string().optional(),
                content: z.string(),
                uploader_role: z.string().optional(),
                collection: z.string().optional(),
            }),
        })),
    }),
});

/**
 * One Elasticsearch index per collection (`<prefix><collection>`), holding chunk
 * text plus a `chunk_embedding` dense vector. Cosine kNN scores come back already
 * normalised to [0, 1].
 */
@Injectable()
export class ElasticVectorIndex implements VectorIndex {
    private readonly logger = new Logger(ElasticVectorIndex.name);
    private readonly indexPrefix: string;

    constructor(
        private readonly elasticService: ElasticService,
        @Inject(EMBEDDING_SERVICE) private readonly embeddings: EmbeddingService,
        configService: ConfigService,
    ) {
        this.indexPrefix = configService.get<string>('ELASTIC_INDEX_PREFIX') || 'kb_';
    }

    indexFor(collection: CollectionId): string {
        return `${this.indexPrefix}${collection.toLowerCase()}`;
    }

    async similaritySearch(collection: CollectionId, queryText: string, k: number, signal?: AbortSignal): Promise<VectorMatch[]> {
        const [qvec] = await this.embeddings.embedTexts([queryText]);
        if (!qvec || qvec.length === 0) {
            throw new Error('Embedding service returned no vector for the query');
        }

        let raw: unknown;
        try {
            raw = await this.elasticService.elasticPost(`/${this.indexFor(collection)}/_search`, {
                knn: {
                    field: "chunk_embedding",
                    query_vector: qvec,
                    k,
                    num_candidates: Math.max(100, k * 10)
                },
                size: k,
                _source: ["doc_id", "chunk_index", "title", "content", "uploader_role", "collection"]
            }, signal);
        } catch (error) {
            // Not indexed yet: ingestion is eventually consistent.
            if (error instanceof ElasticRequestError && error.indexMissing) {
                this.logger.warn(`Index ${this.indexFor(collection)} does not exist yet`);
                return [];
            }
            throw error;
        }

        const parsed = knnResponseSchema.parse(raw);
        return parsed.hits.hits.map(hit => ({
            chunkId: { documentId: hit._source.doc_id, offset: hit._source.chunk_index },
            text: hit._source.content,
            score: hit._score ?? 0,
            metadata: {
                documentName: hit._source.title ?? hit._source.doc_id,
                uploaderRole: hit._source.uploader_role,
                collection: hit._source.collection,
            },
        }));
    }
}
