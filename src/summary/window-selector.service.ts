import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ENV_DEFAULTS } from '../config/env.validation';
import { MESSAGE_STORE, MessageStore } from '../messages/message-store';
import { ChatMessage } from '../messages/message.types';
import {
  Selector,
  SelectorLimits,
  describeSelector,
  parseSelector,
  selectorDurationMs,
} from './selector';
import { EmptyWindowError } from './summary.errors';

export interface MessageWindow {
  selector: Selector;
  description: string;
  messages: ChatMessage[];
}

@Injectable()
export class WindowSelectorService {
  private readonly limits: SelectorLimits;

  constructor(
    @Inject(MESSAGE_STORE) private readonly store: MessageStore,
    cfg: ConfigService,
  ) {
    this.limits = {
      maxCount:
        cfg.get<number>('MAX_SUMMARY_COUNT') ?? ENV_DEFAULTS.MAX_SUMMARY_COUNT,
      maxWindowHours:
        cfg.get<number>('MAX_WINDOW_HOURS') ?? ENV_DEFAULTS.MAX_WINDOW_HOURS,
    };
  }

  parse(raw: string): Selector {
    return parseSelector(raw, this.limits);
  }

  /**
   * Parses `raw` and selects the window from the chat's log.
   *
   * @throws ValidationError before any store access when `raw` is malformed
   * @throws EmptyWindowError when the window holds no messages
   */
  async resolve(
    chatId: string,
    raw: string,
    now = Date.now(),
  ): Promise<MessageWindow> {
    return this.select(chatId, this.parse(raw), now);
  }

  async select(
    chatId: string,
    selector: Selector,
    now = Date.now(),
  ): Promise<MessageWindow> {
    const messages =
      selector.kind === 'count'
        ? await this.store.queryByCount(chatId, selector.count)
        : await this.store.queryByTime(
            chatId,
            selectorDurationMs(selector),
            now,
          );

    const description = describeSelector(selector);
    if (messages.length === 0) {
      throw new EmptyWindowError(selector, description);
    }
    return { selector, description, messages };
  }
}
