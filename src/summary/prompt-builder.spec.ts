import { ChatMessage } from '../messages/message.types';
import { SUMMARY_INSTRUCTION, buildPrompt, renderLine } from './prompt-builder';

function msg(sender: string, text: string, timestamp = 0): ChatMessage {
  return { chatId: '42', sender, text, timestamp };
}

describe('buildPrompt', () => {
  const messages = [msg('alice', 'hi'), msg('bob', 'line1\nline2')];

  it('renders one sender: text line per message under the instruction', () => {
    expect(buildPrompt(messages, 'last 2 messages', { maxChars: 1000 })).toBe(
      [
        SUMMARY_INSTRUCTION,
        '',
        'Messages (last 2 messages, 2 messages):',
        'alice: hi',
        'bob: line1 line2',
        '',
        'Summary:',
      ].join('\n'),
    );
  });

  it('is deterministic for equal input', () => {
    const copy = messages.map((m) => ({ ...m }));
    const a = buildPrompt(messages, 'last 1 day', { maxChars: 1000 });
    const b = buildPrompt(copy, 'last 1 day', { maxChars: 1000 });
    expect(a).toBe(b);
  });

  it('drops lines past the budget and says how many', () => {
    const many = Array.from({ length: 5 }, () => msg('u', 'xxxxxxxx'));
    const prompt = buildPrompt(many, 'last 5 messages', { maxChars: 30 });

    expect(prompt.split('\n').slice(2)).toEqual([
      'Messages (last 5 messages, 5 messages):',
      'u: xxxxxxxx',
      'u: xxxxxxxx',
      '[... 3 more messages omitted]',
      '',
      'Summary:',
    ]);
  });

  it('always keeps the first message', () => {
    const prompt = buildPrompt([msg('u', 'a long message')], 'last 1 message', {
      maxChars: 5,
    });
    expect(prompt).toContain('\nu: a long message\n');
    expect(prompt).not.toContain('omitted');
  });

  it('accepts a custom instruction', () => {
    const prompt = buildPrompt(messages, 'last 2 messages', {
      maxChars: 1000,
      instruction: 'Summarize in one sentence.',
    });
    expect(prompt.startsWith('Summarize in one sentence.\n\n')).toBe(true);
  });
});

describe('renderLine', () => {
  it('collapses line breaks and surrounding blanks', () => {
    expect(renderLine(msg('carol', '  first\r\n   second \n third  '))).toBe(
      'carol: first second third',
    );
  });
});
