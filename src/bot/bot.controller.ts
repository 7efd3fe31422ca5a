import {
  Body,
  Controller,
  Headers,
  HttpException,
  InternalServerErrorException,
  Logger,
  Post,
  UnauthorizedException,
} from '@nestjs/common';
import { BotService } from './bot.service';
import { TelegramAdapter } from './adapters/telegram.adapter';

@Controller()
export class BotController {
  private readonly log = new Logger(BotController.name);

  constructor(
    private readonly bot: BotService,
    private readonly tg: TelegramAdapter,
  ) {}

  @Post('telegram/webhook')
  async telegram(
    @Body() body: unknown,
    @Headers('x-telegram-bot-api-secret-token') secret?: string,
  ) {
    if (!this.tg.isAuthorized(secret)) {
      this.log.warn('[TG] Webhook call with a wrong secret token');
      throw new UnauthorizedException();
    }

    const msg = this.tg.fromIncoming(body);
    if (!msg) {
      this.log.debug('[TG] Update without processable message');
      return 'OK';
    }

    try {
      await this.bot.handle(msg, (text) => this.tg.sendReply(msg, text));
      return 'OK';
    } catch (err) {
      if (err instanceof HttpException) throw err;
      this.log.error(`[TG] ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
      throw new InternalServerErrorException(
        'Error processing Telegram update',
      );
    }
  }
}
