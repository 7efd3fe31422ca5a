import { ConfigService } from '@nestjs/config';
import { InMemoryMessageStore } from '../messages/in-memory-message-store';
import { RedisService } from '../redis';
import { SummarizationClient } from '../summary/summarization.client';
import { USAGE_TEXT } from '../summary/summary.replies';
import { SummaryService } from '../summary/summary.service';
import { WindowSelectorService } from '../summary/window-selector.service';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { BotService } from './bot.service';
import { DomainMessage } from './contracts';

function dm(overrides: Partial<DomainMessage> = {}): DomainMessage {
  return {
    channel: 'telegram',
    chatId: '42',
    chatType: 'group',
    platformMessageId: '1',
    sender: '@alice',
    text: 'hello',
    receivedAt: 1_000,
    ...overrides,
  };
}

describe('BotService', () => {
  let store: InMemoryMessageStore;
  let summarize: jest.Mock<Promise<string>, [string]>;
  let reply: jest.Mock<Promise<void>, [string]>;
  let bot: BotService;

  beforeEach(() => {
    const cfg = new ConfigService({ TELEGRAM_BOT_USERNAME: '@digest_bot' });
    store = new InMemoryMessageStore({ maxMessagesPerChat: 0, maxAgeMs: 0 });
    summarize = jest.fn<Promise<string>, [string]>().mockResolvedValue('A summary');
    reply = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
    const summarizer: SummarizationClient = { summarize };
    const summary = new SummaryService(
      store,
      new WindowSelectorService(store, cfg),
      summarizer,
      cfg,
    );
    bot = new BotService(summary, new TelegramAdapter(cfg), new RedisService(cfg));
  });

  afterEach(() => jest.restoreAllMocks());

  it('logs plain group text without replying', async () => {
    await bot.handle(dm(), reply);

    expect(reply).not.toHaveBeenCalled();
    expect(await store.queryByCount('42', 10)).toEqual([
      { chatId: '42', sender: '@alice', text: 'hello', timestamp: 1_000, messageId: '1' },
    ]);
  });

  it('logs supergroup text too', async () => {
    await bot.handle(dm({ chatType: 'supergroup' }), reply);
    expect(await store.queryByCount('42', 10)).toHaveLength(1);
  });

  it('does not log private chats', async () => {
    await bot.handle(dm({ chatType: 'private' }), reply);
    expect(await store.queryByCount('42', 10)).toEqual([]);
  });

  it('does not log slash-prefixed text that is not a command', async () => {
    await bot.handle(dm({ text: '/ hi' }), reply);

    expect(reply).not.toHaveBeenCalled();
    expect(await store.queryByCount('42', 10)).toEqual([]);
  });

  it('logs a redelivered message once', async () => {
    await bot.handle(dm(), reply);
    await bot.handle(dm(), reply);

    expect(await store.queryByCount('42', 10)).toHaveLength(1);
  });

  it('answers /start and /help with usage', async () => {
    await bot.handle(dm({ text: '/start' }), reply);
    await bot.handle(dm({ text: '/help@Digest_Bot' }), reply);

    expect(reply.mock.calls).toEqual([[USAGE_TEXT], [USAGE_TEXT]]);
  });

  it('ignores commands addressed to another bot', async () => {
    await bot.handle(dm({ text: '/summarize@other_bot last 5' }), reply);

    expect(summarize).not.toHaveBeenCalled();
    expect(reply).not.toHaveBeenCalled();
  });

  it('ignores unknown commands and does not log them', async () => {
    await bot.handle(dm({ text: '/weather' }), reply);

    expect(reply).not.toHaveBeenCalled();
    expect(await store.queryByCount('42', 10)).toEqual([]);
  });

  it('summarizes on /summarize', async () => {
    await bot.handle(dm({ platformMessageId: '1', text: 'first' }), reply);
    await bot.handle(dm({ platformMessageId: '2', text: 'second' }), reply);

    await bot.handle(dm({ platformMessageId: '3', text: '/summarize last 2' }), reply);

    expect(reply).toHaveBeenCalledWith('📊 Summary for last 2 messages:\n\nA summary');
    expect(summarize).toHaveBeenCalledTimes(1);
    expect(await store.queryByCount('42', 10)).toHaveLength(2);
  });

  it('does not summarize a redelivered command twice', async () => {
    await bot.handle(dm({ platformMessageId: '1', text: 'first' }), reply);
    const command = dm({ platformMessageId: '2', text: '/summarize last 1' });

    await bot.handle(command, reply);
    await bot.handle(command, reply);

    expect(summarize).toHaveBeenCalledTimes(1);
    expect(reply).toHaveBeenCalledTimes(1);
  });

  it('answers a redelivered command whose reply could not be sent', async () => {
    await bot.handle(dm({ platformMessageId: '1', text: 'first' }), reply);
    const command = dm({ platformMessageId: '2', text: '/summarize last 1' });
    reply.mockRejectedValueOnce(new Error('send failed'));

    await expect(bot.handle(command, reply)).rejects.toThrow('send failed');
    await bot.handle(command, reply);

    expect(reply).toHaveBeenCalledTimes(2);
    expect(reply).toHaveBeenLastCalledWith('📊 Summary for last 1 message:\n\nA summary');
  });

  it('lets a failed message be processed again', async () => {
    jest.spyOn(store, 'append').mockRejectedValueOnce(new Error('disk full'));

    await expect(bot.handle(dm(), reply)).rejects.toThrow('disk full');
    await bot.handle(dm(), reply);

    expect(await store.queryByCount('42', 10)).toHaveLength(1);
  });
});
