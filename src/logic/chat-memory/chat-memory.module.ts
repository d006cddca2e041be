import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatMemoryService } from './chat-memory.service';
import { ConversationContextService } from './context.service';
import { GeminiModule } from '../gemini/gemini.module';
import { Conversation, InfoSource, Message } from '../../entities';
import { CONVERSATION_STORE } from './types';

@Module({
    imports: [
        GeminiModule,
        TypeOrmModule.forFeature([Conversation, Message, InfoSource])
    ],
    exports: [ChatMemoryService, ConversationContextService, CONVERSATION_STORE],
    providers: [
        ChatMemoryService,
        ConversationContextService,
        { provide: CONVERSATION_STORE, useExisting: ChatMemoryService },
    ],
})
export class ChatMemoryModule {}
