import { Module } from '@nestjs/common';
import { BotService } from './bot.service';
import { BotController } from './bot.controller';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { SummaryModule } from '../summary/summary.module';

@Module({
  imports: [SummaryModule],
  controllers: [BotController],
  providers: [BotService, TelegramAdapter],
})
export class BotModule {}
