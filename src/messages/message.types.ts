import { ConfigService } from '@nestjs/config';
import { ENV_DEFAULTS } from '../config/env.validation';

/** One received chat message. Never mutated once stored. */
export interface ChatMessage {
  readonly chatId: string;
  readonly sender: string;
  readonly text: string;
  /** Epoch milliseconds at receipt; non-decreasing per chat. */
  readonly timestamp: number;
  readonly messageId?: string;
}

/**
 * Retention applied on append and on every query. A zero disables that cap.
 */
export interface RetentionPolicy {
  maxMessagesPerChat: number;
  maxAgeMs: number;
}

export function retentionFromConfig(cfg: ConfigService): RetentionPolicy {
  const maxMessagesPerChat =
    cfg.get<number>('MESSAGE_RETENTION_MAX_PER_CHAT') ??
    ENV_DEFAULTS.MESSAGE_RETENTION_MAX_PER_CHAT;
  const hours =
    cfg.get<number>('MESSAGE_RETENTION_HOURS') ??
    ENV_DEFAULTS.MESSAGE_RETENTION_HOURS;

  return { maxMessagesPerChat, maxAgeMs: hours * 3600_000 };
}

/** Oldest timestamp still retained at `now`. */
export function retentionCutoff(policy: RetentionPolicy, now: number): number {
  return policy.maxAgeMs > 0 ? now - policy.maxAgeMs : -Infinity;
}

export function isChatMessage(value: unknown): value is ChatMessage {
  if (typeof value !== 'object' || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.chatId === 'string' &&
    typeof v.sender === 'string' &&
    typeof v.text === 'string' &&
    typeof v.timestamp === 'number' &&
    Number.isFinite(v.timestamp) &&
    (v.messageId === undefined || typeof v.messageId === 'string')
  );
}
