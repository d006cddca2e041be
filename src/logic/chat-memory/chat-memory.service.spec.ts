import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ChatMemoryService } from './chat-memory.service';
import { Conversation, InfoSource, Message } from '../../entities';
import { ConversationAccessError, ConversationNotFoundError, RagValidationError } from '../../utils/errors';
import { CollectionId } from '../access-scope/types';

describe('ChatMemoryService', () => {
  let service: ChatMemoryService;
  const conversationRepository = { save: jest.fn(), findOne: jest.fn(), find: jest.fn(), update: jest.fn(), delete: jest.fn(), count: jest.fn() };
  const messageRepository = { save: jest.fn(), find: jest.fn(), count: jest.fn() };
  const infoSourceRepository = { save: jest.fn() };

  const owned = {
    id: 'c1',
    userId: 'u1',
    title: 'Budget',
    createdAt: new Date('2024-03-01T10:00:00Z'),
    updatedAt: new Date('2024-03-01T10:05:00Z'),
  };

  beforeEach(async () => {
    for (const repo of [conversationRepository, messageRepository, infoSourceRepository]) {
      Object.values(repo).forEach(fn => fn.mockReset());
    }
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatMemoryService,
        { provide: getRepositoryToken(Conversation), useValue: conversationRepository },
        { provide: getRepositoryToken(Message), useValue: messageRepository },
        { provide: getRepositoryToken(InfoSource), useValue: infoSourceRepository },
      ],
    }).compile();

    service = module.get<ChatMemoryService>(ChatMemoryService);
  });

  describe('ensureConversation', () => {
    it('creates a conversation titled after the first message', async () => {
      conversationRepository.save.mockResolvedValue({ id: 'c-new' });
      await expect(service.ensureConversation('u1', 'what is the q4 budget?')).resolves.toBe('c-new');
      expect(conversationRepository.save).toHaveBeenCalledWith({ userId: 'u1', title: 'What is the q4 budget?' });
    });

    it('reuses a conversation the user owns', async () => {
      conversationRepository.findOne.mockResolvedValue(owned);
      await expect(service.ensureConversation('u1', 'hello', 'c1')).resolves.toBe('c1');
      expect(conversationRepository.save).not.toHaveBeenCalled();
    });

    it('rejects a conversation owned by someone else', async () => {
      conversationRepository.findOne.mockResolvedValue(owned);
      await expect(service.ensureConversation('u2', 'hello', 'c1')).rejects.toBeInstanceOf(ConversationAccessError);
    });

    it('rejects an unknown conversation', async () => {
      conversationRepository.findOne.mockResolvedValue(null);
      await expect(service.ensureConversation('u1', 'hello', 'missing')).rejects.toBeInstanceOf(ConversationNotFoundError);
    });
  });

  it('loads the most recent turns in chronological order', async () => {
    messageRepository.find.mockResolvedValue([
      { role: 'assistant', content: 'It was 1.2M.', ts: new Date('2024-03-01T10:00:02Z') },
      { role: 'user', content: 'What was Q4 revenue?', ts: new Date('2024-03-01T10:00:01Z') },
    ]);

    const history = await service.loadHistory('c1', 10);

    expect(messageRepository.find).toHaveBeenCalledWith({ where: { conversationId: 'c1' }, order: { ts: 'DESC' }, take: 10 });
    expect(history).toEqual([
      { role: 'user', content: 'What was Q4 revenue?', timestamp: new Date('2024-03-01T10:00:01Z') },
      { role: 'assistant', content: 'It was 1.2M.', timestamp: new Date('2024-03-01T10:00:02Z') },
    ]);
  });

  it('stores an assistant turn with its citations', async () => {
    const ts = new Date('2024-03-01T10:00:02Z');
    messageRepository.save.mockResolvedValue({ id: 'm9' });

    const id = await service.appendTurn('c1', {
      role: 'assistant',
      content: 'Revenue grew 12% [Source 1].',
      timestamp: ts,
      confidence: 0.833,
      tokensUsed: 420,
      citations: [{ documentName: 'q4.pdf', collection: CollectionId.Finance, chunkKey: 'q4#0', score: 0.91, excerpt: 'Revenue grew 12%' }],
    });

    expect(id).toBe('m9');
    expect(messageRepository.save).toHaveBeenCalledWith({
      conversationId: 'c1',
      userId: null,
      role: 'assistant',
      content: 'Revenue grew 12% [Source 1].',
      confidence: 0.833,
      tokensUsed: 420,
      ts,
    });
    expect(infoSourceRepository.save).toHaveBeenCalledWith([
      { messageId: 'm9', documentName: 'q4.pdf', collection: 'Finance', chunkKey: 'q4#0', excerpt: 'Revenue grew 12%', score: 0.91, position: 0 },
    ]);
    expect(conversationRepository.update).toHaveBeenCalledWith('c1', { updatedAt: ts });
  });

  it('skips citation rows for a turn without citations', async () => {
    messageRepository.save.mockResolvedValue({ id: 'm1' });
    await service.appendTurn('c1', { role: 'user', content: 'hi', timestamp: new Date(0), userId: 'u1' });
    expect(infoSourceRepository.save).not.toHaveBeenCalled();
  });

  it('returns a conversation with ordered citations', async () => {
    conversationRepository.findOne.mockResolvedValue(owned);
    messageRepository.find.mockResolvedValue([
      {
        id: 'm2',
        role: 'assistant',
        content: 'See both.',
        ts: new Date('2024-03-01T10:00:02Z'),
        confidence: 0.5,
        tokensUsed: 100,
        source: [
          { documentName: 'b.pdf', collection: 'General', chunkKey: 'b#1', score: 0.8, excerpt: 'b', position: 1 },
          { documentName: 'a.pdf', collection: 'Finance', chunkKey: 'a#0', score: 0.9, excerpt: 'a', position: 0 },
        ],
      },
    ]);

    const result = await service.getConversationWithMessages('c1', 'u1');

    expect(result.title).toBe('Budget');
    expect(result.messages[0].citations.map(c => c.documentName)).toEqual(['a.pdf', 'b.pdf']);
  });

  it('deletes only owned conversations', async () => {
    conversationRepository.findOne.mockResolvedValue(owned);
    await expect(service.deleteConversation('c1', 'u2')).rejects.toBeInstanceOf(ConversationAccessError);
    expect(conversationRepository.delete).not.toHaveBeenCalled();

    await service.deleteConversation('c1', 'u1');
    expect(conversationRepository.delete).toHaveBeenCalledWith('c1');
  });

  describe('updateConversationTitle', () => {
    it('trims and stores the title', async () => {
      conversationRepository.findOne.mockResolvedValue(owned);
      const updated = await service.updateConversationTitle('c1', 'u1', '  Q4 planning  ');
      expect(updated.title).toBe('Q4 planning');
      expect(conversationRepository.update).toHaveBeenCalledWith('c1', { title: 'Q4 planning' });
    });

    it('rejects titles over 200 characters', async () => {
      await expect(service.updateConversationTitle('c1', 'u1', 'x'.repeat(201))).rejects.toBeInstanceOf(RagValidationError);
    });
  });

  it('summarises message counts per user', async () => {
    conversationRepository.count.mockResolvedValue(3);
    messageRepository.count.mockResolvedValueOnce(5).mockResolvedValueOnce(5);

    await expect(service.getUserStats('u1')).resolves.toEqual({
      totalMessages: 10,
      totalQuestions: 5,
      totalResponses: 5,
      totalConversations: 3,
      averageMessagesPerConversation: 3.3,
    });
  });
});
