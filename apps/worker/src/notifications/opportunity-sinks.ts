import { Injectable, Logger } from '@nestjs/common';
import { ArbitrageOpportunity, OpportunitySink } from '@libs/market-data';
import { formatOpportunityMessage, TelegramService } from '@libs/telegram';

export const OPPORTUNITY_SINKS = Symbol('OPPORTUNITY_SINKS');

@Injectable()
export class LogOpportunitySink implements OpportunitySink {
  readonly name = 'log';
  private readonly logger = new Logger('ArbitrageOpportunity');

  async notify(opportunity: ArbitrageOpportunity): Promise<void> {
    this.logger.log(
      JSON.stringify({
        event: 'arb_opportunity',
        cycle: opportunity.cycle,
        pair: opportunity.pair.toString(),
        buyVenue: opportunity.buyVenue,
        sellVenue: opportunity.sellVenue,
        buyPrice: opportunity.buyPrice,
        sellPrice: opportunity.sellPrice,
        grossSpreadPct: Number(opportunity.grossSpreadPct.toFixed(4)),
        netProfitPct: Number(opportunity.netProfitPct.toFixed(4)),
        realizableSize: opportunity.realizableSize,
        estimatedProfit: Number(opportunity.estimatedProfit.toFixed(4)),
      }),
    );
  }
}

@Injectable()
export class TelegramOpportunitySink implements OpportunitySink {
  readonly name = 'telegram';

  constructor(private readonly telegramService: TelegramService) {}

  async notify(opportunity: ArbitrageOpportunity): Promise<void> {
    await this.telegramService.sendMessage(formatOpportunityMessage(opportunity));
  }
}
