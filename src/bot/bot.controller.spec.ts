import {
  InternalServerErrorException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { InMemoryMessageStore } from '../messages/in-memory-message-store';
import { MESSAGE_STORE } from '../messages/message-store';
import { RedisService } from '../redis';
import { SummarizationClient } from '../summary/summarization.client';
import { USAGE_TEXT } from '../summary/summary.replies';
import { SummaryService } from '../summary/summary.service';
import { WindowSelectorService } from '../summary/window-selector.service';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { BotController } from './bot.controller';
import { BotService } from './bot.service';

function update(messageId: number, text: string) {
  return {
    update_id: messageId,
    message: {
      message_id: messageId,
      chat: { id: -42, type: 'group' },
      from: { id: 1, username: 'alice' },
      text,
    },
  };
}

describe('BotController', () => {
  let controller: BotController;
  let tg: TelegramAdapter;
  let store: InMemoryMessageStore;
  let sendReply: jest.SpyInstance;

  beforeEach(async () => {
    store = new InMemoryMessageStore({ maxMessagesPerChat: 0, maxAgeMs: 0 });
    const summarizer: SummarizationClient = {
      summarize: jest.fn<Promise<string>, [string]>().mockResolvedValue('A summary'),
    };

    const moduleRef = await Test.createTestingModule({
      controllers: [BotController],
      providers: [
        BotService,
        TelegramAdapter,
        RedisService,
        SummaryService,
        WindowSelectorService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            TELEGRAM_BOT_TOKEN: 'test-token',
            TELEGRAM_WEBHOOK_SECRET: 'test-secret',
          }),
        },
        { provide: MESSAGE_STORE, useValue: store },
        { provide: SummarizationClient, useValue: summarizer },
      ],
    }).compile();

    controller = moduleRef.get(BotController);
    tg = moduleRef.get(TelegramAdapter);
    sendReply = jest.spyOn(tg, 'sendReply').mockResolvedValue(undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('rejects a call with the wrong secret', async () => {
    await expect(controller.telegram(update(1, 'hi'), 'wrong')).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
    expect(await store.queryByCount('-42', 10)).toEqual([]);
  });

  it('acknowledges updates it cannot use', async () => {
    await expect(controller.telegram({ update_id: 9 }, 'test-secret')).resolves.toBe('OK');
    expect(sendReply).not.toHaveBeenCalled();
  });

  it('logs chatter silently', async () => {
    await expect(controller.telegram(update(1, 'hi all'), 'test-secret')).resolves.toBe('OK');

    expect(sendReply).not.toHaveBeenCalled();
    expect((await store.queryByCount('-42', 10)).map((m) => m.text)).toEqual(['hi all']);
  });

  it('sends the command reply', async () => {
    await controller.telegram(update(1, '/help'), 'test-secret');

    expect(sendReply).toHaveBeenCalledWith(
      expect.objectContaining({ chatId: '-42', platformMessageId: '1' }),
      USAGE_TEXT,
    );
  });

  it('sends the summary for /summarize', async () => {
    await controller.telegram(update(1, 'first'), 'test-secret');
    await controller.telegram(update(2, '/summarize last 5'), 'test-secret');

    expect(sendReply).toHaveBeenCalledWith(
      expect.objectContaining({ platformMessageId: '2' }),
      '📊 Summary for last 5 messages:\n\nA summary',
    );
  });

  it('delivers the summary when Telegram redelivers after a failed send', async () => {
    await controller.telegram(update(1, 'first'), 'test-secret');
    sendReply.mockRejectedValueOnce(new Error('Bad Request: chat not found'));

    await expect(
      controller.telegram(update(2, '/summarize last 5'), 'test-secret'),
    ).rejects.toBeInstanceOf(InternalServerErrorException);
    await expect(
      controller.telegram(update(2, '/summarize last 5'), 'test-secret'),
    ).resolves.toBe('OK');

    expect(sendReply).toHaveBeenCalledTimes(2);
    expect(sendReply).toHaveBeenLastCalledWith(
      expect.objectContaining({ platformMessageId: '2' }),
      '📊 Summary for last 5 messages:\n\nA summary',
    );
  });

  it('turns a delivery failure into a 500', async () => {
    sendReply.mockRejectedValue(new Error('socket hang up'));

    await expect(controller.telegram(update(1, '/start'), 'test-secret')).rejects.toBeInstanceOf(
      InternalServerErrorException,
    );
  });
});
