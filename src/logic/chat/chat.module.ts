import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { AccessScopeModule } from '../access-scope/access-scope.module';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { GeminiModule } from '../gemini/gemini.module';
import { QueryAugmentationModule } from '../query-augmentation/query-augmentation.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { PromptModule } from '../prompt/prompt.module';
import { PostProcessorModule } from '../post-processor/post-processor.module';

@Module({
    imports: [
        AccessScopeModule,
        ChatMemoryModule,
        GeminiModule,
        QueryAugmentationModule,
        RetrievalModule,
        PromptModule,
        PostProcessorModule
    ],
    providers: [ChatService],
    exports: [ChatService, ChatMemoryModule],
})
export class ChatModule {}
