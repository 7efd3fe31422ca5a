import { Global, Module } from '@nestjs/common';
import { ChatLockService } from './utils/chat-lock.service';

@Global()
@Module({
  providers: [ChatLockService],
  exports: [ChatLockService],
})
export class CommonModule {}
