import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatLockService } from '../common/utils/chat-lock.service';
import { MessageStoreKind } from '../config/env.validation';
import { RedisService } from '../redis';
import { InMemoryMessageStore } from './in-memory-message-store';
import { MESSAGE_STORE, MessageStore } from './message-store';
import { retentionFromConfig } from './message.types';
import { RedisMessageStore } from './redis-message-store';

export function resolveStoreKind(cfg: ConfigService): MessageStoreKind {
  const explicit = cfg.get<MessageStoreKind>('MESSAGE_STORE');
  if (explicit) return explicit;
  return cfg.get<string>('REDIS_URL') ? 'redis' : 'memory';
}

@Module({
  providers: [
    {
      provide: MESSAGE_STORE,
      inject: [ConfigService, RedisService, ChatLockService],
      useFactory: (
        cfg: ConfigService,
        redis: RedisService,
        locks: ChatLockService,
      ): MessageStore => {
        const kind = resolveStoreKind(cfg);
        const retention = retentionFromConfig(cfg);
        new Logger('MessagesModule').log(
          `Message store: ${kind} (max/chat=${retention.maxMessagesPerChat || 'unbounded'}, maxAgeMs=${retention.maxAgeMs || 'unbounded'})`,
        );

        return kind === 'redis'
          ? new RedisMessageStore(redis, locks, retention)
          : new InMemoryMessageStore(retention);
      },
    },
  ],
  exports: [MESSAGE_STORE],
})
export class MessagesModule {}
