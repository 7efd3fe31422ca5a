import { Module } from '@nestjs/common';
import { MessagesModule } from '../messages/messages.module';
import { GeminiSummarizationClient } from './gemini-summarization.client';
import { SummarizationClient } from './summarization.client';
import { SummaryService } from './summary.service';
import { WindowSelectorService } from './window-selector.service';

@Module({
  imports: [MessagesModule],
  providers: [
    WindowSelectorService,
    SummaryService,
    { provide: SummarizationClient, useClass: GeminiSummarizationClient },
  ],
  exports: [SummaryService],
})
export class SummaryModule {}
