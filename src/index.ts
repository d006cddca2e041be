import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

export { AppModule } from './app.module';
export { ragConfig, parseRagConfig, ragConfigSchema } from './config/rag.config';
export type { RagConfig } from './config/rag.config';
export * from './entities';
export * from './utils/errors';
export { TimeoutError, AbortedError } from './utils/async';

export { AccessScopeModule } from './logic/access-scope/access-scope.module';
export { AccessScopeService, accessScope, inScope, isRole, parseCollectionTag } from './logic/access-scope/access-scope.service';
export { Role, CollectionId, ROLE_COLLECTIONS } from './logic/access-scope/types';
export type { AccessScope } from './logic/access-scope/types';

export { ChatModule } from './logic/chat/chat.module';
export { ChatService } from './logic/chat/chat.service';
export type { SubmitTurnDto } from './logic/chat/dto/submit-turn.dto';
export type { TurnResult, TurnWarning, TurnWarningCode, PipelineInfo } from './logic/chat/types';

export { ChatMemoryModule } from './logic/chat-memory/chat-memory.module';
export { ChatMemoryService } from './logic/chat-memory/chat-memory.service';
export { ConversationContextService } from './logic/chat-memory/context.service';
export { CONVERSATION_STORE } from './logic/chat-memory/types';
export type {
  ConversationStore,
  ConversationSummary,
  ConversationWithMessages,
  NewTurn,
  StoredMessage,
  Turn,
  TurnCitation,
  TurnRole,
  UserStats,
} from './logic/chat-memory/types';

export { GeminiModule } from './logic/gemini/gemini.module';
export { GeminiService } from './logic/gemini/gemini.service';
export { GENERATION_SERVICE, EMBEDDING_SERVICE } from './logic/gemini/types';
export type { GenerationService, GenerationResult, EmbeddingService } from './logic/gemini/types';

export { ElasticModule } from './logic/elastic/elastic.module';
export { ElasticVectorIndex } from './logic/elastic/elastic-vector-index.service';
export { VECTOR_INDEX } from './logic/retrieval/types';
export type { VectorIndex, VectorMatch, RankedChunk, RankedResult } from './logic/retrieval/types';

export type { Citation, GeneratedAnswer } from './logic/post-processor/types';

/** Boots the pipeline with its MySQL, Elasticsearch and Gemini adapters, without an HTTP server. */
export async function createRagContext(): Promise<INestApplicationContext> {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();
  return app;
}
