import { Module } from '@nestjs/common';
import { ElasticService } from './elastic.service';
import { ElasticVectorIndex } from './elastic-vector-index.service';
import { GeminiModule } from '../gemini/gemini.module';
import { VECTOR_INDEX } from '../retrieval/types';

@Module({
    imports: [GeminiModule],
    exports: [ElasticService, VECTOR_INDEX],
    providers: [
        ElasticService,
        ElasticVectorIndex,
        { provide: VECTOR_INDEX, useExisting: ElasticVectorIndex },
    ],
})
export class ElasticModule {}
