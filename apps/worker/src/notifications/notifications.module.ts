import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { OpportunitySink } from '@libs/market-data';
import { TelegramService } from '@libs/telegram';
import { OpportunityDispatcherService } from './opportunity-dispatcher.service';
import { LogOpportunitySink, OPPORTUNITY_SINKS, TelegramOpportunitySink } from './opportunity-sinks';

@Module({
  imports: [CoreModule],
  providers: [
    TelegramService,
    LogOpportunitySink,
    TelegramOpportunitySink,
    {
      provide: OPPORTUNITY_SINKS,
      useFactory: (
        logSink: LogOpportunitySink,
        telegramSink: TelegramOpportunitySink,
        telegramService: TelegramService,
      ): OpportunitySink[] => (telegramService.isEnabled ? [logSink, telegramSink] : [logSink]),
      inject: [LogOpportunitySink, TelegramOpportunitySink, TelegramService],
    },
    OpportunityDispatcherService,
  ],
  exports: [OpportunityDispatcherService],
})
export class NotificationsModule {}
