import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ragConfig } from '../../config/rag.config';
import { RankedChunk } from '../retrieval/types';
import { GenerationResult } from '../gemini/types';
import { clip, normalizeText } from '../../utils/textNormalizer';
import { DECLINE_SENTENCE, FINAL_ANSWER_MARKER } from '../prompt/prompts';
import { computeConfidence } from './confidence';
import { Citation, GeneratedAnswer } from './types';

const EXCERPT_LENGTH = 500;
const CITATION_MARKER = /\[(?:Source\s*|#)?(\d+)\]/gi;
const LEADING_LABEL = /^(?:answer|response|assistant)\s*:\s*/i;

/** Keeps the text after the last "Final Answer:" and strips echoed speaker labels. */
export function cleanResponse(raw: string): string {
  let text = normalizeText(raw);
  const at = text.toLowerCase().lastIndexOf(FINAL_ANSWER_MARKER.toLowerCase());
  if (at >= 0) {
    text = text.slice(at + FINAL_ANSWER_MARKER.length).trim();
  }
  while (LEADING_LABEL.test(text)) {
    text = text.replace(LEADING_LABEL, '').trim();
  }
  return text;
}

/** Source numbers cited in `text` that exist in the prompt, in order of first appearance. */
export function citedSourceNumbers(text: string, sourceCount: number): number[] {
  const seen = new Set<number>();
  for (const match of text.matchAll(CITATION_MARKER)) {
    const n = Number(match[1]);
    if (n >= 1 && n <= sourceCount) {
      seen.add(n);
    }
  }
  return [...seen];
}

function toCitation(chunk: RankedChunk, sourceNumber: number): Citation {
  return {
    sourceNumber,
    documentName: chunk.metadata.documentName,
    collection: chunk.collection,
    chunkKey: chunk.key,
    score: chunk.score,
    excerpt: clip(chunk.text.trim(), EXCERPT_LENGTH),
  };
}

@Injectable()
export class ResponsePostProcessorService {
  constructor(
    @Inject(ragConfig.KEY)
    private readonly config: ConfigType<typeof ragConfig>,
  ) { }

  /** `sources` are the chunks the prompt carried, in [Source n] order. */
  process(raw: GenerationResult, sources: readonly RankedChunk[]): GeneratedAnswer {
    const text = cleanResponse(raw.text) || DECLINE_SENTENCE;
    const cited = citedSourceNumbers(text, sources.length);
    const citedExplicitly = cited.length > 0;
    const citations = citedExplicitly
      ? cited.map(n => toCitation(sources[n - 1], n))
      : sources.map((chunk, i) => toCitation(chunk, i + 1));

    return {
      text,
      citations,
      citedExplicitly,
      confidence: computeConfidence({
        scores: sources.map(chunk => chunk.score),
        threshold: this.config.similarityThreshold,
        topK: this.config.topK,
        certainty: raw.certainty,
      }),
      tokenCount: raw.tokenCount,
    };
  }
}
