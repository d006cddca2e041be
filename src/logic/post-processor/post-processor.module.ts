import { Module } from '@nestjs/common';
import { ResponsePostProcessorService } from './response-post-processor.service';

@Module({
  exports: [ResponsePostProcessorService],
  providers: [ResponsePostProcessorService],
})
export class PostProcessorModule {}
