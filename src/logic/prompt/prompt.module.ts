import { Module } from '@nestjs/common';
import { PromptComposerService } from './prompt-composer.service';

@Module({
  exports: [PromptComposerService],
  providers: [PromptComposerService],
})
export class PromptModule {}
