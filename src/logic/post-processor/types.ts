import { TurnCitation } from '../chat-memory/types';

export interface Citation extends TurnCitation {
  /** The n of the [Source n] label the chunk had in the prompt. */
  sourceNumber: number;
}

export interface GeneratedAnswer {
  text: string;
  citations: Citation[];
  /** False when the model cited nothing and every prompt source is attached. */
  citedExplicitly: boolean;
  confidence: number;
  tokenCount: number;
}
