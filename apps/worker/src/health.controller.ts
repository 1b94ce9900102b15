import { Controller, Get } from '@nestjs/common';
import { MarketDataOrchestrator, VenueHealth, VenueRegistryService } from '@libs/market-data';
import { ArbitrageHealth, ArbitrageScannerService } from './arbitrage/arbitrage-scanner.service';
import { DispatchStats, OpportunityDispatcherService } from './notifications/opportunity-dispatcher.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly arbitrageScannerService: ArbitrageScannerService,
    private readonly venueRegistryService: VenueRegistryService,
    private readonly orchestrator: MarketDataOrchestrator,
    private readonly dispatcher: OpportunityDispatcherService,
  ) {}

  @Get()
  health(): { ok: true } {
    return { ok: true };
  }

  @Get('arbitrage')
  arbitrage(): { ok: true; notifications: DispatchStats } & ArbitrageHealth {
    return { ok: true, ...this.arbitrageScannerService.getHealth(), notifications: this.dispatcher.getStats() };
  }

  @Get('venues')
  venues(): { ok: true; venues: VenueHealth[] } {
    const cooldowns = this.orchestrator.getCooldowns();
    const venues = this.venueRegistryService
      .getHealth()
      .map((health) => ({ ...health, coolingDownUntil: cooldowns[health.venue] ?? null }));
    return { ok: true, venues };
  }
}
