import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ragConfig } from '../../config/rag.config';
import { GENERATION_SERVICE, GenerationService } from '../gemini/types';
import { isAbortError } from '../../utils/async';
import { errorMessage } from '../../utils/errors';
import { buildAugmentationPrompt, parseVariants } from './prompts';
import domainSynonyms from './domain-synonyms.json';

const DOMAIN_SYNONYMS: Readonly<Record<string, readonly string[]>> = domainSynonyms;
const CONTEXT_TERMS = ['employee', 'company policy', 'guidelines', 'procedure'];
const AUGMENTATION_MAX_TOKENS = 512;

export interface AugmentedQuery {
    /** Variant 0 is always the standalone query. */
    variants: string[];
    degraded: boolean;
}

function replaceFirst(query: string, word: string, replacement: string): string {
    const at = query.toLowerCase().indexOf(word);
    return at < 0 ? query : query.slice(0, at) + replacement + query.slice(at + word.length);
}

/** Synonym swaps, then question re-orderings, then context suffixes. */
export function fallbackVariants(query: string): string[] {
    const lower = query.toLowerCase();
    const candidates: string[] = [];

    for (const [word, synonyms] of Object.entries(DOMAIN_SYNONYMS)) {
        if (lower.includes(word)) {
            candidates.push(...synonyms.map(synonym => replaceFirst(query, word, synonym)));
        }
    }

    const body = query.replace(/\?+$/, '').trim();
    if (/^how\s/i.test(body)) {
        candidates.push(`${body.replace(/^how\s+(?:(?:do|can|should)\s+(?:i|we)\s+)?/i, '')} procedure and guidelines`);
    } else if (/^what\s/i.test(body)) {
        candidates.push(`Tell me about ${body.replace(/^what\s+(?:(?:is|are|was|were)\s+)?/i, '')}`);
    }

    for (const term of CONTEXT_TERMS) {
        if (!lower.includes(term)) {
            candidates.push(`${query} for ${term}`);
        }
    }
    return candidates;
}

@Injectable()
export class QueryAugmentationService {
    private readonly logger = new Logger(QueryAugmentationService.name);

    constructor(
        @Inject(GENERATION_SERVICE)
        private readonly generator: GenerationService,
        @Inject(ragConfig.KEY)
        private readonly config: ConfigType<typeof ragConfig>,
    ) { }

    async augment(standaloneQuery: string, signal?: AbortSignal): Promise<AugmentedQuery> {
        const count = this.config.augmentationVariantCount;
        if (count <= 1) {
            return { variants: [standaloneQuery], degraded: false };
        }

        let generated: string[];
        try {
            const result = await this.generator.generate(
                buildAugmentationPrompt(standaloneQuery, count - 1),
                AUGMENTATION_MAX_TOKENS,
                signal,
            );
            generated = parseVariants(result.text);
        } catch (error) {
            if (signal?.aborted || isAbortError(error)) {
                throw error;
            }
            this.logger.warn(`Augmentation failed, searching with the original query only: ${errorMessage(error)}`);
            return { variants: [standaloneQuery], degraded: true };
        }

        const variants = [standaloneQuery];
        const seen = new Set([standaloneQuery.toLowerCase()]);
        const add = (candidate: string) => {
            const key = candidate.toLowerCase();
            if (variants.length < count && candidate && !seen.has(key)) {
                seen.add(key);
                variants.push(candidate);
            }
        };

        generated.forEach(add);
        if (variants.length < count) {
            this.logger.log(`Model returned ${variants.length - 1} paraphrases, padding from the synonym table`);
            fallbackVariants(standaloneQuery).forEach(add);
        }

        this.logger.log(`Generated ${variants.length - 1} augmented queries`);
        return { variants, degraded: false };
    }
}
