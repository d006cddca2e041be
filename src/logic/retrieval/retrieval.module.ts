import { Module } from '@nestjs/common';
import { RetrieverService } from './retriever.service';
import { RankerService } from './ranker';
import { ElasticModule } from '../elastic/elastic.module';

@Module({
    imports: [ElasticModule],
    exports: [RetrieverService, RankerService],
    providers: [RetrieverService, RankerService],
})
export class RetrievalModule {}
