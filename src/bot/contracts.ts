export type Channel = 'telegram';

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface DomainMessage {
  channel: Channel;
  chatId: string;
  chatType: ChatType;
  platformMessageId: string; // message_id (TG)
  sender: string;
  text: string;
  receivedAt: number; // epoch ms
}

/** Delivers one reply to the chat the message came from. */
export type ReplySender = (text: string) => Promise<void>;

export interface BotCommand {
  name: string;
  /** Bot username from `/cmd@BotName`, if given. */
  target?: string;
  args: string;
}

const COMMAND_RE = /^\/([a-z0-9_]+)(?:@([a-z0-9_]+))?(?:\s+([\s\S]*))?$/i;

export function parseCommand(text: string): BotCommand | null {
  const match = COMMAND_RE.exec(text.trim());
  if (!match) return null;
  return {
    name: match[1].toLowerCase(),
    target: match[2],
    args: (match[3] ?? '').trim(),
  };
}
