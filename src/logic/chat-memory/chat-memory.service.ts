import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Conversation, InfoSource, Message } from '../../entities';
import { ConversationAccessError, ConversationNotFoundError, RagValidationError } from '../../utils/errors';
import { formatConversationTitle } from '../../utils/textNormalizer';
import { isCollectionId } from '../access-scope/access-scope.service';
import {
  ConversationStore,
  ConversationSummary,
  ConversationWithMessages,
  NewTurn,
  StoredMessage,
  Turn,
  TurnCitation,
  TurnRole,
  UserStats,
} from './types';

const MAX_TITLE_LENGTH = 200;

function toTurnRole(role: string): TurnRole {
  return role === 'assistant' ? 'assistant' : 'user';
}

function toSummary(c: Conversation): ConversationSummary {
  return { id: c.id, title: c.title, createdAt: c.createdAt, updatedAt: c.updatedAt };
}

function toCitations(sources: InfoSource[] | undefined): TurnCitation[] {
  return [...(sources ?? [])]
    .sort((a, b) => a.position - b.position)
    .flatMap(s =>
      isCollectionId(s.collection)
        ? [{ documentName: s.documentName, collection: s.collection, chunkKey: s.chunkKey, score: s.score, excerpt: s.excerpt }]
        : [],
    );
}

@Injectable()
export class ChatMemoryService implements ConversationStore {
  private readonly logger = new Logger(ChatMemoryService.name);

  constructor(
    @InjectRepository(Conversation)
    private readonly conversationRepository: Repository<Conversation>,
    @InjectRepository(Message)
    private readonly messageRepository: Repository<Message>,
    @InjectRepository(InfoSource)
    private readonly infoSourceRepository: Repository<InfoSource>,
  ) { }

  async ensureConversation(userId: string, firstMessage: string, conversationId?: string): Promise<string> {
    if (conversationId) {
      const conversation = await this.findOwned(conversationId, userId);
      return conversation.id;
    }
    const created = await this.conversationRepository.save({ userId, title: formatConversationTitle(firstMessage) });
    this.logger.log(`Created conversation ${created.id} for user ${userId}`);
    return created.id;
  }

  async loadHistory(conversationId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    // newest first then reverse: chronological for the LLM
    const msgs = await this.messageRepository.find({
      where: { conversationId },
      order: { ts: 'DESC' },
      take: limit,
    });
    return msgs.reverse().map(m => ({ role: toTurnRole(m.role), content: m.content, timestamp: m.ts }));
  }

  async appendTurn(conversationId: string, turn: NewTurn): Promise<string> {
    const message = await this.messageRepository.save({
      conversationId,
      userId: turn.userId ?? null,
      role: turn.role,
      content: turn.content,
      confidence: turn.confidence ?? null,
      tokensUsed: turn.tokensUsed ?? null,
      ts: turn.timestamp,
    });

    const citations = turn.citations ?? [];
    if (citations.length > 0) {
      await this.infoSourceRepository.save(citations.map((c, position) => ({
        messageId: message.id,
        documentName: c.documentName,
        collection: c.collection,
        chunkKey: c.chunkKey,
        excerpt: c.excerpt,
        score: c.score,
        position,
      })));
    }

    await this.conversationRepository.update(conversationId, { updatedAt: turn.timestamp });
    return message.id;
  }

  async listConversations(userId: string, skip = 0, take = 20): Promise<ConversationSummary[]> {
    const conversations = await this.conversationRepository.find({
      where: { userId },
      order: { updatedAt: 'DESC' },
      skip,
      take,
    });
    return conversations.map(toSummary);
  }

  async getConversationWithMessages(conversationId: string, userId: string): Promise<ConversationWithMessages> {
    const conversation = await this.findOwned(conversationId, userId);
    const msgs = await this.messageRepository.find({
      where: { conversationId },
      order: { ts: 'ASC' },
      relations: { source: true },
    });
    const messages: StoredMessage[] = msgs.map(m => ({
      id: m.id,
      role: toTurnRole(m.role),
      content: m.content,
      timestamp: m.ts,
      confidence: m.confidence,
      tokensUsed: m.tokensUsed,
      citations: toCitations(m.source),
    }));
    return { ...toSummary(conversation), messages };
  }

  async deleteConversation(conversationId: string, userId: string): Promise<void> {
    await this.findOwned(conversationId, userId);
    await this.conversationRepository.delete(conversationId);
    this.logger.log(`Deleted conversation ${conversationId}`);
  }

  async updateConversationTitle(conversationId: string, userId: string, title: string): Promise<ConversationSummary> {
    const trimmed = title.trim();
    if (!trimmed) {
      throw new RagValidationError('Title cannot be empty');
    }
    if (trimmed.length > MAX_TITLE_LENGTH) {
      throw new RagValidationError(`Title too long (max ${MAX_TITLE_LENGTH} characters)`);
    }
    const conversation = await this.findOwned(conversationId, userId);
    await this.conversationRepository.update(conversationId, { title: trimmed });
    return { ...toSummary(conversation), title: trimmed };
  }

  async getUserStats(userId: string): Promise<UserStats> {
    const [totalConversations, totalQuestions, totalResponses] = await Promise.all([
      this.conversationRepository.count({ where: { userId } }),
      this.messageRepository.count({ where: { role: 'user', conversation: { userId } } }),
      this.messageRepository.count({ where: { role: 'assistant', conversation: { userId } } }),
    ]);
    const totalMessages = totalQuestions + totalResponses;
    return {
      totalMessages,
      totalQuestions,
      totalResponses,
      totalConversations,
      averageMessagesPerConversation: totalConversations
        ? Math.round((totalMessages / totalConversations) * 10) / 10
        : 0,
    };
  }

  private async findOwned(conversationId: string, userId: string): Promise<Conversation> {
    const conversation = await this.conversationRepository.findOne({ where: { id: conversationId } });
    if (!conversation) {
      throw new ConversationNotFoundError(conversationId);
    }
    if (conversation.userId !== userId) {
      throw new ConversationAccessError(conversationId);
    }
    return conversation;
  }
}
