import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ArbitrageOpportunity, OpportunitySink } from '@libs/market-data';
import { OPPORTUNITY_SINKS } from './opportunity-sinks';

export interface DispatchStats {
  delivered: number;
  failed: number;
  pending: number;
}

/**
 * Hands opportunities to every sink without waiting for them. A sink failure is
 * logged and counted; it never reaches the scan loop.
 */
@Injectable()
export class OpportunityDispatcherService implements OnModuleDestroy {
  private readonly logger = new Logger(OpportunityDispatcherService.name);
  private readonly inFlight = new Set<Promise<void>>();
  private delivered = 0;
  private failed = 0;

  constructor(
    @Inject(OPPORTUNITY_SINKS)
    private readonly sinks: OpportunitySink[],
  ) {}

  dispatch(opportunities: readonly ArbitrageOpportunity[]): void {
    for (const opportunity of opportunities) {
      for (const sink of this.sinks) {
        const delivery = this.deliver(sink, opportunity);
        this.inFlight.add(delivery);
        void delivery.finally(() => this.inFlight.delete(delivery));
      }
    }
  }

  /** Resolves once every delivery started so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  getStats(): DispatchStats {
    return { delivered: this.delivered, failed: this.failed, pending: this.inFlight.size };
  }

  async onModuleDestroy(): Promise<void> {
    await this.idle();
  }

  private async deliver(sink: OpportunitySink, opportunity: ArbitrageOpportunity): Promise<void> {
    try {
      await sink.notify(opportunity);
      this.delivered += 1;
    } catch (error) {
      this.failed += 1;
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        JSON.stringify({
          event: 'opportunity_notify_failed',
          sink: sink.name,
          pair: opportunity.pair.toString(),
          message,
        }),
      );
    }
  }
}
