import { ChatMessage } from '../messages/message.types';

export const SUMMARY_INSTRUCTION = [
  'Please provide a concise summary of the following group chat messages.',
  'Focus on the main topics, key points, decisions and important information discussed.',
  'Use a few short paragraphs or bullet points and keep it under 300 words.',
].join(' ');

export interface PromptOptions {
  /** Budget for the transcript lines. */
  maxChars: number;
  instruction?: string;
}

export function renderLine(message: ChatMessage): string {
  const text = message.text.replace(/\s*\r?\n\s*/g, ' ').trim();
  return `${message.sender}: ${text}`;
}

/**
 * Renders messages as one `sender: text` line each, in order, under an
 * instruction header. Lines past `maxChars` are dropped from the end and
 * replaced by a count of what was left out.
 */
export function buildPrompt(
  messages: readonly ChatMessage[],
  description: string,
  options: PromptOptions,
): string {
  const lines: string[] = [];
  let used = 0;

  for (const message of messages) {
    const line = renderLine(message);
    if (used + line.length + 1 > options.maxChars && lines.length > 0) break;
    lines.push(line);
    used += line.length + 1;
  }

  const omitted = messages.length - lines.length;
  if (omitted > 0) {
    lines.push(`[... ${omitted} more messages omitted]`);
  }

  return [
    options.instruction ?? SUMMARY_INSTRUCTION,
    '',
    `Messages (${description}, ${messages.length} messages):`,
    ...lines,
    '',
    'Summary:',
  ].join('\n');
}
