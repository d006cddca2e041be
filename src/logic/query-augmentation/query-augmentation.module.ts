import { Module } from '@nestjs/common';
import { QueryAugmentationService } from './query-augmentation.service';
import { GeminiModule } from '../gemini/gemini.module';

@Module({
    imports: [GeminiModule],
    exports: [QueryAugmentationService],
    providers: [QueryAugmentationService],
})
export class QueryAugmentationModule {}
