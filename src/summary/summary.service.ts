import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { debugLog } from '../common/utils/debug-logger';
import { ENV_DEFAULTS } from '../config/env.validation';
import { MESSAGE_STORE, MessageStore } from '../messages/message-store';
import { ChatMessage } from '../messages/message.types';
import { buildPrompt } from './prompt-builder';
import { SummarizationClient } from './summarization.client';
import {
  EmptyWindowError,
  SummarizationError,
  ValidationError,
} from './summary.errors';
import {
  SUMMARY_FAILED_REPLY,
  UNEXPECTED_ERROR_REPLY,
  emptyWindowReply,
  invalidSelectorReply,
  summaryReply,
} from './summary.replies';
import { WindowSelectorService } from './window-selector.service';

/**
 * The two entry points the chat integration drives: logging a message and
 * answering a summarize command.
 */
@Injectable()
export class SummaryService {
  private readonly log = debugLog.summary;
  private readonly maxPromptChars: number;

  constructor(
    @Inject(MESSAGE_STORE) private readonly store: MessageStore,
    private readonly windows: WindowSelectorService,
    private readonly summarizer: SummarizationClient,
    cfg: ConfigService,
  ) {
    this.maxPromptChars =
      cfg.get<number>('MAX_PROMPT_CHARS') ?? ENV_DEFAULTS.MAX_PROMPT_CHARS;
  }

  async onMessage(message: ChatMessage, cid?: string): Promise<void> {
    await this.store.append(message.chatId, message);
    this.log.store('Message logged', { chat: message.chatId, sender: message.sender }, cid);
  }

  /**
   * Runs selection, prompt rendering and summarization for one command and
   * returns the text to send back. Every failure becomes a reply; the store
   * is only read on this path.
   */
  async onSummarizeCommand(
    chatId: string,
    selector: string,
    cid?: string,
  ): Promise<string> {
    try {
      const windowTimer = this.log.timer('Window selected', cid);
      const window = await this.windows.resolve(chatId, selector);
      windowTimer();
      this.log.window(window.description, { chat: chatId, messages: window.messages.length }, cid);

      const prompt = buildPrompt(window.messages, window.description, {
        maxChars: this.maxPromptChars,
      });

      const linkTimer = this.log.timer('Summarization', cid);
      this.log.link('Requesting summary', { promptChars: prompt.length }, cid);
      const summary = await this.summarizer.summarize(prompt);
      linkTimer();

      this.log.ok('Summary ready', { length: summary.length }, cid);
      return summaryReply(window.description, summary);
    } catch (err) {
      if (err instanceof ValidationError) {
        this.log.warn('Invalid selector', { selector, reason: err.message }, cid);
        return invalidSelectorReply(err.message);
      }
      if (err instanceof EmptyWindowError) {
        this.log.window('Empty window', { chat: chatId, window: err.description }, cid);
        return emptyWindowReply(err.selector);
      }
      if (err instanceof SummarizationError) {
        this.log.err(`Summarization failed: ${err.code}`, { message: err.message }, cid);
        return SUMMARY_FAILED_REPLY;
      }

      this.log.err('Unexpected error', { error: String(err) }, cid);
      return UNEXPECTED_ERROR_REPLY;
    }
  }
}
