import { Injectable } from '@nestjs/common';
import { RankedChunk, RankedResult, RawHit } from './types';

interface Merged {
    best: RawHit;
    variants: Set<number>;
}

function compareRanked(a: RankedChunk, b: RankedChunk): number {
    if (b.score !== a.score) return b.score - a.score;
    if (b.matchCount !== a.matchCount) return b.matchCount - a.matchCount;
    if (a.id.documentId !== b.id.documentId) return a.id.documentId < b.id.documentId ? -1 : 1;
    return a.id.offset - b.id.offset;
}

/**
 * Deduplicates by chunk id keeping the highest score, counts the variants that
 * surfaced each chunk, and orders by score, then match count, then document
 * position. The order depends only on the hit set, never on arrival order.
 */
export function mergeHits(hits: readonly RawHit[], topK: number): RankedResult {
    const byKey = new Map<string, Merged>();
    for (const hit of hits) {
        const existing = byKey.get(hit.chunk.key);
        if (!existing) {
            byKey.set(hit.chunk.key, { best: hit, variants: new Set([hit.variantIndex]) });
            continue;
        }
        existing.variants.add(hit.variantIndex);
        if (hit.chunk.score > existing.best.chunk.score) {
            existing.best = hit;
        }
    }

    const chunks = [...byKey.values()]
        .map(({ best, variants }) => ({ ...best.chunk, matchCount: variants.size, rank: 0 }))
        .sort(compareRanked)
        .slice(0, Math.max(0, topK))
        .map((chunk, index) => ({ ...chunk, rank: index + 1 }));

    return { chunks };
}

@Injectable()
export class RankerService {
    merge(hits: readonly RawHit[], topK: number): RankedResult {
        return mergeHits(hits, topK);
    }
}
