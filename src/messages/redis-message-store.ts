import { Logger } from '@nestjs/common';
import { ChatLockService } from '../common/utils/chat-lock.service';
import { RedisKeys, RedisService } from '../redis';
import { MessageStore } from './message-store';
import {
  ChatMessage,
  RetentionPolicy,
  isChatMessage,
  retentionCutoff,
} from './message.types';

/**
 * Message log kept in one Redis list per chat, oldest first, so it survives
 * restarts. Operations on a chat run under that chat's lock: an append reads
 * the tail before pushing, and a query must not observe a half-pruned list.
 */
export class RedisMessageStore implements MessageStore {
  private readonly logger = new Logger(RedisMessageStore.name);

  constructor(
    private readonly redis: RedisService,
    private readonly locks: ChatLockService,
    private readonly retention: RetentionPolicy,
  ) {}

  append(chatId: string, message: ChatMessage): Promise<void> {
    return this.locks.runExclusive(chatId, async () => {
      const key = RedisKeys.chatMessages(chatId);
      const [last] = this.decode(chatId, await this.redis.lrange(key, -1, -1));
      const timestamp =
        last && last.timestamp > message.timestamp
          ? last.timestamp
          : message.timestamp;

      const length = await this.redis.rpush(
        key,
        JSON.stringify({ ...message, chatId, timestamp }),
      );

      const { maxMessagesPerChat } = this.retention;
      if (maxMessagesPerChat > 0 && length > maxMessagesPerChat) {
        await this.redis.ltrim(key, -maxMessagesPerChat, -1);
      }

      await this.pruneExpired(chatId, key, Date.now());
    });
  }

  queryByTime(
    chatId: string,
    sinceMs: number,
    now = Date.now(),
  ): Promise<ChatMessage[]> {
    return this.locks.runExclusive(chatId, async () => {
      const from = Math.max(
        now - sinceMs,
        retentionCutoff(this.retention, now),
      );
      const all = this.decode(
        chatId,
        await this.redis.lrange(RedisKeys.chatMessages(chatId), 0, -1),
      );
      return all.filter((m) => m.timestamp >= from);
    });
  }

  queryByCount(chatId: string, n: number): Promise<ChatMessage[]> {
    return this.locks.runExclusive(chatId, async () => {
      if (n <= 0) return [];
      const cutoff = retentionCutoff(this.retention, Date.now());
      const tail = this.decode(
        chatId,
        await this.redis.lrange(RedisKeys.chatMessages(chatId), -n, -1),
      );
      return tail.filter((m) => m.timestamp >= cutoff);
    });
  }

  private async pruneExpired(chatId: string, key: string, now: number) {
    const cutoff = retentionCutoff(this.retention, now);
    if (cutoff === -Infinity) return;

    const [head] = this.decode(chatId, await this.redis.lrange(key, 0, 0));
    if (!head || head.timestamp >= cutoff) return;

    // Index into the raw list: malformed entries count as expired.
    const raw = await this.redis.lrange(key, 0, -1);
    const keepFrom = raw.findIndex((entry) => {
      const m = parseEntry(entry);
      return m !== null && m.timestamp >= cutoff;
    });
    if (keepFrom === -1) {
      await this.redis.del(key);
    } else {
      await this.redis.ltrim(key, keepFrom, -1);
    }
    this.logger.debug(`Pruned expired messages from chat ${chatId}`);
  }

  private decode(chatId: string, raw: string[]): ChatMessage[] {
    const messages: ChatMessage[] = [];
    for (const entry of raw) {
      const parsed = parseEntry(entry);
      if (parsed) {
        messages.push(parsed);
      } else {
        this.logger.warn(`Skipping malformed entry in chat ${chatId}`);
      }
    }
    return messages;
  }
}

function parseEntry(entry: string): ChatMessage | null {
  try {
    const parsed: unknown = JSON.parse(entry);
    return isChatMessage(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
