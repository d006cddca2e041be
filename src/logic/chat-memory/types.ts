import { CollectionId } from '../access-scope/types';

export type TurnRole = 'user' | 'assistant';

export interface Turn {
  role: TurnRole;
  content: string;
  timestamp: Date;
}

export interface TurnCitation {
  documentName: string;
  collection: CollectionId;
  chunkKey: string;
  score: number;
  excerpt: string;
}

export interface NewTurn {
  role: TurnRole;
  content: string;
  timestamp: Date;
  userId?: string;
  citations?: TurnCitation[];
  confidence?: number;
  tokensUsed?: number;
}

export interface ConversationSummary {
  id: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface StoredMessage extends Turn {
  id: string;
  confidence: number | null;
  tokensUsed: number | null;
  citations: TurnCitation[];
}

export interface ConversationWithMessages extends ConversationSummary {
  messages: StoredMessage[];
}

export interface UserStats {
  totalMessages: number;
  totalQuestions: number;
  totalResponses: number;
  totalConversations: number;
  averageMessagesPerConversation: number;
}

export interface ConversationStore {
  /** Returns the id of an owned existing conversation, or of a newly created one titled after `firstMessage`. */
  ensureConversation(userId: string, firstMessage: string, conversationId?: string): Promise<string>;
  /** Chronological turns, at most `limit` of the most recent. */
  loadHistory(conversationId: string, limit: number): Promise<Turn[]>;
  /** Resolves with the stored message id. */
  appendTurn(conversationId: string, turn: NewTurn): Promise<string>;
}

export const CONVERSATION_STORE = Symbol('CONVERSATION_STORE');
