import { ChatMessage } from './message.types';

export const MESSAGE_STORE = 'MESSAGE_STORE';

/**
 * Append-only message log partitioned by chat.
 *
 * Queries return messages in insertion order. An empty result is a normal
 * outcome, never an error.
 */
export interface MessageStore {
  /**
   * Adds a message at the end of its chat's sequence. A timestamp older than
   * the chat's last message is raised to it, so order and time agree.
   */
  append(chatId: string, message: ChatMessage): Promise<void>;

  /** Messages with `timestamp >= now - sinceMs`. */
  queryByTime(
    chatId: string,
    sinceMs: number,
    now?: number,
  ): Promise<ChatMessage[]>;

  /** The last `n` messages, or all of them when fewer exist. */
  queryByCount(chatId: string, n: number): Promise<ChatMessage[]>;
}
