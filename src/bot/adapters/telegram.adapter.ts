import {
  Injectable,
  InternalServerErrorException,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { Agent } from 'https';
import { timingSafeEqual } from 'crypto';
import { withRetry } from '../../common/utils/resilience';
import { ChatType, DomainMessage } from '../contracts';

// Force IPv4 to avoid timeout issues in Docker
const httpsAgent = new Agent({ family: 4 });

const CHAT_TYPES: readonly ChatType[] = ['private', 'group', 'supergroup', 'channel'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isChatType(value: unknown): value is ChatType {
  return typeof value === 'string' && CHAT_TYPES.some((t) => t === value);
}

/** `@username`, else first/last name, else `Unknown`. */
export function senderName(from: unknown): string {
  if (!isRecord(from)) return 'Unknown';
  if (typeof from.username === 'string' && from.username) {
    return `@${from.username}`;
  }
  const name = [from.first_name, from.last_name]
    .filter((p): p is string => typeof p === 'string' && p.length > 0)
    .join(' ');
  return name || 'Unknown';
}

@Injectable()
export class TelegramAdapter implements OnApplicationBootstrap {
  private readonly log = new Logger(TelegramAdapter.name);
  constructor(private readonly cfg: ConfigService) {}

  async onApplicationBootstrap() {
    await this.registerWebhook();
  }

  /**
   * Maps a webhook update to a DomainMessage. Only new text messages are
   * processed; edits, media and service updates yield null.
   */
  fromIncoming(body: unknown, receivedAt = Date.now()): DomainMessage | null {
    const msg = isRecord(body) ? body.message : undefined;
    if (!isRecord(msg) || typeof msg.text !== 'string' || !msg.text.trim()) {
      this.log.debug('Telegram update without processable text');
      return null;
    }

    const chat = msg.chat;
    if (!isRecord(chat) || chat.id === undefined || !isChatType(chat.type)) {
      this.log.debug('Telegram update without a usable chat');
      return null;
    }

    const domainMessage: DomainMessage = {
      channel: 'telegram',
      chatId: String(chat.id),
      chatType: chat.type,
      platformMessageId: String(msg.message_id),
      sender: senderName(msg.from),
      text: msg.text.trim(),
      receivedAt,
    };
    this.log.debug(
      `[fromIncoming] TG message ${domainMessage.platformMessageId} in ${domainMessage.chatId}`,
    );
    return domainMessage;
  }

  /**
   * Checks the `X-Telegram-Bot-Api-Secret-Token` header against the shared
   * webhook secret. Without a configured secret every request passes.
   */
  isAuthorized(header: string | undefined): boolean {
    const secret = this.cfg.get<string>('TELEGRAM_WEBHOOK_SECRET');
    if (!secret) return true;
    if (!header) return false;

    const expected = Buffer.from(secret);
    const given = Buffer.from(header);
    return expected.length === given.length && timingSafeEqual(expected, given);
  }

  /** True when a `/cmd@Name` mention targets this bot (or no bot at all). */
  isAddressedToMe(target: string | undefined): boolean {
    const me = this.cfg.get<string>('TELEGRAM_BOT_USERNAME');
    if (!target || !me) return true;
    return target.toLowerCase() === me.replace(/^@/, '').toLowerCase();
  }

  async sendReply(dm: DomainMessage, text: string) {
    await this.call('sendMessage', {
      chat_id: dm.chatId,
      text,
      reply_to_message_id: Number(dm.platformMessageId),
      allow_sending_without_reply: true,
    });
    this.log.log(`TG message sent to ${dm.chatId}`);
  }

  /**
   * Points Telegram at TELEGRAM_WEBHOOK_URL. Skipped when no URL is set
   * (webhook managed outside the app). A failure is logged and the app keeps
   * serving, since an already-registered webhook still works.
   */
  async registerWebhook(): Promise<boolean> {
    const url = this.cfg.get<string>('TELEGRAM_WEBHOOK_URL');
    if (!url) {
      this.log.log('TELEGRAM_WEBHOOK_URL not set, skipping webhook registration');
      return false;
    }

    const secret = this.cfg.get<string>('TELEGRAM_WEBHOOK_SECRET');
    try {
      await this.call('setWebhook', {
        url,
        allowed_updates: ['message'],
        ...(secret ? { secret_token: secret } : {}),
      });
      this.log.log(`Webhook registered at ${url}`);
      return true;
    } catch (err) {
      this.log.error(
        `Webhook registration failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return false;
    }
  }

  private async call(method: string, payload: Record<string, unknown>) {
    const token = this.cfg.get<string>('TELEGRAM_BOT_TOKEN');
    if (!token) {
      throw new InternalServerErrorException('TELEGRAM_BOT_TOKEN not configured');
    }

    const url = `https://api.telegram.org/bot${token}/${method}`;

    try {
      await withRetry(
        () => axios.post(url, payload, { timeout: 15_000, httpsAgent }),
        {
          maxAttempts: TELEGRAM_MAX_ATTEMPTS,
          shouldRetry: isRetryableTelegramError,
          backoff: telegramBackoff,
          onRetry: (attempt, err, delayMs) =>
            this.log.warn(
              `Telegram ${method} attempt ${attempt}/${TELEGRAM_MAX_ATTEMPTS} failed (${describeAttemptError(err)}), retrying in ${delayMs}ms`,
            ),
        },
      );
    } catch (err) {
      if (!axios.isAxiosError(err)) throw err;
      const status = err.response?.status;
      if (status === undefined) {
        this.log.error(`Telegram ${method} failed: ${err.code ?? err.message}`);
        throw new InternalServerErrorException(
          `Network error calling Telegram ${method}: ${err.code ?? err.message}`,
        );
      }
      throw new InternalServerErrorException(
        `Telegram API error (${status}): ${describeTelegramError(err.response?.data) ?? err.message}`,
      );
    }
  }
}

const TELEGRAM_MAX_ATTEMPTS = 3;

/** Rate limits, server errors and network failures (no response) are retried. */
export function isRetryableTelegramError(err: unknown): boolean {
  if (!axios.isAxiosError(err)) return false;
  const status = err.response?.status;
  return status === undefined || status === 429 || status >= 500;
}

/** 1s, 2s for HTTP errors; 0.5s, 1s for network failures. */
export function telegramBackoff(attempt: number, err: unknown): number {
  const answered = axios.isAxiosError(err) && err.response !== undefined;
  return (answered ? 1000 : 500) * attempt;
}

function describeAttemptError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.response ? `HTTP ${err.response.status}` : err.code ?? err.message;
  }
  return String(err);
}

function describeTelegramError(data: unknown): string | undefined {
  return isRecord(data) && typeof data.description === 'string'
    ? data.description
    : undefined;
}
