import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { DomainMessage, ReplySender, parseCommand } from './contracts';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { SummaryService } from '../summary/summary.service';
import { USAGE_TEXT } from '../summary/summary.replies';
import { RedisService, RedisKeys, RedisTTL } from '../redis';
import { debugLog } from '../common/utils/debug-logger';

const LOGGED_CHAT_TYPES = new Set(['group', 'supergroup']);

@Injectable()
export class BotService {
  private readonly log = debugLog.bot;

  constructor(
    private readonly summary: SummaryService,
    private readonly tg: TelegramAdapter,
    private readonly redis: RedisService,
  ) {}

  /**
   * Routes one inbound message and sends its reply, if it has one, through
   * `reply`. Plain chatter, foreign or unknown commands and redeliveries get
   * none.
   */
  async handle(m: DomainMessage, reply: ReplySender): Promise<void> {
    const cid = this.generateCorrelationId();

    this.log.separator(cid);
    this.log.recv(`${m.channel} message`, { chat: m.chatId, type: m.chatType, text: m.text.substring(0, 50) }, cid);

    const command = parseCommand(m.text);

    if (!command) {
      if (m.text.startsWith('/')) {
        this.log.recv('Malformed command ignored', { text: m.text.substring(0, 50) }, cid);
        return;
      }
      if (!LOGGED_CHAT_TYPES.has(m.chatType)) {
        this.log.store('Not a group chat, message not logged', { chat: m.chatId }, cid);
        return;
      }
      await this.once(m, cid, () =>
        this.summary.onMessage(
          {
            chatId: m.chatId,
            sender: m.sender,
            text: m.text,
            timestamp: m.receivedAt,
            messageId: m.platformMessageId,
          },
          cid,
        ),
      );
      return;
    }

    if (!this.tg.isAddressedToMe(command.target)) {
      this.log.recv('Command for another bot ignored', { target: command.target }, cid);
      return;
    }

    switch (command.name) {
      case 'start':
      case 'help':
        await reply(USAGE_TEXT);
        return;
      case 'summarize':
        await this.once(m, cid, async () => {
          const text = await this.summary.onSummarizeCommand(m.chatId, command.args, cid);
          await reply(text);
          this.log.send('Reply delivered', { length: text.length }, cid);
        });
        return;
      default:
        this.log.recv('Unknown command ignored', { command: command.name }, cid);
    }
  }

  /**
   * Runs `fn` once per platform message. Telegram redelivers an update when
   * the webhook does not answer in time; the redelivery must neither log the
   * message twice nor bill a second summary.
   *
   * Two-phase: "processing" with a short TTL (expires if the process dies),
   * then "done" for a day. A failure anywhere in `fn`, reply delivery
   * included, clears the key so the redelivery runs it again.
   */
  private async once(
    m: DomainMessage,
    cid: string,
    fn: () => Promise<void>,
  ): Promise<void> {
    const dedupKey = RedisKeys.msgDedup(m.chatId, m.platformMessageId);
    const dedupState = await this.redis.get(dedupKey);

    if (dedupState) {
      this.log.warn(`Duplicate ignored (${dedupState})`, { msgId: m.platformMessageId }, cid);
      return;
    }

    await this.redis.set(dedupKey, 'processing', RedisTTL.MSG_DEDUP_PROCESSING);

    try {
      await fn();
      await this.redis.set(dedupKey, 'done', RedisTTL.MSG_DEDUP_DONE);
    } catch (err) {
      this.log.err('Processing failed', { error: String(err) }, cid);
      await this.redis.del(dedupKey);
      throw err;
    }
  }

  private generateCorrelationId(): string {
    return randomUUID().substring(0, 8);
  }
}
