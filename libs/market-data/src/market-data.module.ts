import { Module } from '@nestjs/common';
import { APP_SETTINGS, AppSettings, CoreModule } from '@libs/core';
import { OpportunityScanner } from './arbitrage/opportunity-scanner';
import { MarketDataOrchestrator } from './orchestrator/market-data-orchestrator';
import { CoinMarketCapClient } from './symbol-universe/coinmarketcap.client';
import { SymbolUniverseService } from './symbol-universe/symbol-universe.service';
import { createExchangeFacades } from './venue-facade.factory';
import { VENUE_FACADES, VenueRegistryService } from './venue-registry.service';

@Module({
  imports: [CoreModule],
  providers: [
    {
      provide: VENUE_FACADES,
      useFactory: (settings: AppSettings) => createExchangeFacades(settings),
      inject: [APP_SETTINGS],
    },
    VenueRegistryService,
    {
      provide: MarketDataOrchestrator,
      useFactory: (settings: AppSettings, registry: VenueRegistryService) =>
        new MarketDataOrchestrator(registry.getFacades(), {
          deadlineMs: settings.cycle.deadlineMs,
          rateLimitCooldownMs: settings.cycle.rateLimitCooldownMs,
        }),
      inject: [APP_SETTINGS, VenueRegistryService],
    },
    {
      provide: OpportunityScanner,
      useFactory: (settings: AppSettings, registry: VenueRegistryService) =>
        new OpportunityScanner(registry.getProfiles(), settings.scanner),
      inject: [APP_SETTINGS, VenueRegistryService],
    },
    {
      provide: SymbolUniverseService,
      useFactory: (settings: AppSettings, registry: VenueRegistryService) => {
        const { universe } = settings;
        const ranking = universe.cmcApiKey
          ? CoinMarketCapClient.create(universe.cmcBaseUrl, universe.cmcApiKey, settings.cycle.requestTimeoutMs)
          : null;
        return new SymbolUniverseService(registry.getFacades(), ranking, {
          ...universe,
          deadlineMs: settings.cycle.deadlineMs,
        });
      },
      inject: [APP_SETTINGS, VenueRegistryService],
    },
  ],
  exports: [VENUE_FACADES, VenueRegistryService, MarketDataOrchestrator, OpportunityScanner, SymbolUniverseService],
})
export class MarketDataModule {}
