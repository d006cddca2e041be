import { Module } from '@nestjs/common';
import { AccessScopeService } from './access-scope.service';

@Module({
    exports: [AccessScopeService],
    providers: [AccessScopeService],
})
export class AccessScopeModule {}
