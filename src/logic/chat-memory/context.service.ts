import { Inject, Injectable, Logger } from '@nestjs/common';
import { GENERATION_SERVICE, GenerationService } from '../gemini/types';
import { isAbortError } from '../../utils/async';
import { errorMessage } from '../../utils/errors';
import { buildRewritePrompt, cleanRewrite } from './prompts';
import { Turn } from './types';

const REWRITE_MAX_TOKENS = 256;

export interface StandaloneQuery {
  text: string;
  /** True when the rewrite failed and the raw message is used instead. */
  degraded: boolean;
}

@Injectable()
export class ConversationContextService {
  private readonly logger = new Logger(ConversationContextService.name);

  constructor(
    @Inject(GENERATION_SERVICE)
    private readonly generator: GenerationService,
  ) { }

  async buildStandaloneQuery(history: readonly Turn[], message: string, signal?: AbortSignal): Promise<StandaloneQuery> {
    if (history.length === 0) {
      return { text: message, degraded: false };
    }

    try {
      const result = await this.generator.generate(buildRewritePrompt(history, message), REWRITE_MAX_TOKENS, signal);
      const rewritten = cleanRewrite(result.text);
      if (!rewritten) {
        this.logger.warn('Rewrite returned no text, using the raw message');
        return { text: message, degraded: true };
      }
      this.logger.log(`Standalone query: "${rewritten.slice(0, 50)}"`);
      return { text: rewritten, degraded: false };
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      this.logger.warn(`Contextualization failed, using the raw message: ${errorMessage(error)}`);
      return { text: message, degraded: true };
    }
  }
}
