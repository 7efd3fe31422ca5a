import { Logger } from '@nestjs/common';
import { MessageStore } from './message-store';
import {
  ChatMessage,
  RetentionPolicy,
  retentionCutoff,
} from './message.types';

/**
 * Process-lifetime message log.
 *
 * Every operation completes within one event-loop turn, so operations on a
 * chat are serialized without a lock.
 */
export class InMemoryMessageStore implements MessageStore {
  private readonly logger = new Logger(InMemoryMessageStore.name);
  private readonly chats = new Map<string, ChatMessage[]>();

  constructor(private readonly retention: RetentionPolicy) {}

  async append(chatId: string, message: ChatMessage): Promise<void> {
    const log = this.chats.get(chatId) ?? [];
    const last = log[log.length - 1];
    const timestamp =
      last && last.timestamp > message.timestamp
        ? last.timestamp
        : message.timestamp;

    log.push(Object.freeze({ ...message, chatId, timestamp }));
    this.chats.set(chatId, log);
    this.prune(chatId, log, Date.now());
  }

  async queryByTime(
    chatId: string,
    sinceMs: number,
    now = Date.now(),
  ): Promise<ChatMessage[]> {
    const from = Math.max(now - sinceMs, retentionCutoff(this.retention, now));
    const log = this.chats.get(chatId) ?? [];
    const start = log.findIndex((m) => m.timestamp >= from);
    return start === -1 ? [] : log.slice(start);
  }

  async queryByCount(chatId: string, n: number): Promise<ChatMessage[]> {
    const cutoff = retentionCutoff(this.retention, Date.now());
    const log = (this.chats.get(chatId) ?? []).filter(
      (m) => m.timestamp >= cutoff,
    );
    return log.slice(Math.max(log.length - n, 0));
  }

  private prune(chatId: string, log: ChatMessage[], now: number) {
    const { maxMessagesPerChat } = this.retention;
    let drop = 0;

    if (maxMessagesPerChat > 0 && log.length > maxMessagesPerChat) {
      drop = log.length - maxMessagesPerChat;
    }

    const cutoff = retentionCutoff(this.retention, now);
    while (drop < log.length && log[drop].timestamp < cutoff) drop++;

    if (drop > 0) {
      log.splice(0, drop);
      this.logger.debug(`Pruned ${drop} message(s) from chat ${chatId}`);
    }
  }
}
