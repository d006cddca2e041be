import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { EMBEDDING_SERVICE, GENERATION_SERVICE } from './types';

@Module({
    exports: [GeminiService, GENERATION_SERVICE, EMBEDDING_SERVICE],
    providers: [
        GeminiService,
        { provide: GENERATION_SERVICE, useExisting: GeminiService },
        { provide: EMBEDDING_SERVICE, useExisting: GeminiService },
    ],
})
export class GeminiModule {}
