import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ragConfig } from '../../config/rag.config';
import { AccessScope } from '../access-scope/types';
import { RankedChunk, RankedResult } from '../retrieval/types';
import { Turn } from '../chat-memory/types';
import { FatalPipelineError } from '../../utils/errors';
import { estimateTokens } from '../../utils/textNormalizer';
import { renderPrompt } from './prompts';

export interface ComposedPrompt {
  text: string;
  /** The ranked chunks that made it into the prompt, numbered from [Source 1]. */
  chunks: RankedChunk[];
  droppedChunks: number;
  estimatedTokens: number;
}

@Injectable()
export class PromptComposerService {
  private readonly logger = new Logger(PromptComposerService.name);

  constructor(
    @Inject(ragConfig.KEY)
    private readonly config: ConfigType<typeof ragConfig>,
  ) { }

  /** Drops whole chunks from the lowest rank up until the prompt fits the token budget. */
  compose(question: string, ranked: RankedResult, history: readonly Turn[], scope: AccessScope): ComposedPrompt {
    const budget = this.config.promptTokenBudget;
    const chunks = [...ranked.chunks];

    while (true) {
      const text = renderPrompt(question, chunks, history, scope);
      const estimatedTokens = estimateTokens(text);
      if (estimatedTokens <= budget) {
        const droppedChunks = ranked.chunks.length - chunks.length;
        if (droppedChunks > 0) {
          this.logger.warn(`Dropped ${droppedChunks} lowest-ranked chunks to fit ${budget} tokens`);
        }
        return { text, chunks, droppedChunks, estimatedTokens };
      }
      if (chunks.length === 0) {
        throw new FatalPipelineError(
          'composition',
          `Prompt needs ${estimatedTokens} tokens without any context, budget is ${budget}`,
        );
      }
      chunks.pop();
    }
  }
}
