import { describe, expect, it } from 'vitest';
import { buildAppSettings } from '@libs/core';
import {
  ExchangeFacade,
  MarketDataOrchestrator,
  OpportunityScanner,
  Quote,
  RateLimitedError,
  SymbolUniverseService,
  TradingPair,
  VenueHealth,
  VenueProfile,
  VenueRegistryService,
} from '@libs/market-data';
import { ArbitrageScannerService } from '../apps/worker/src/arbitrage/arbitrage-scanner.service';
import { HealthController } from '../apps/worker/src/health.controller';
import { OpportunityDispatcherService } from '../apps/worker/src/notifications/opportunity-dispatcher.service';

const BTC = TradingPair.of('BTC', 'USDT');

class StubFacade implements ExchangeFacade {
  constructor(
    readonly venue: string,
    private readonly quote: () => Promise<Quote>,
    private readonly failures = 0,
  ) {}

  fetchQuote(): Promise<Quote> {
    return this.quote();
  }

  fetchTickerUniverse(): Promise<TradingPair[]> {
    return Promise.resolve([BTC]);
  }

  venueProfile(): VenueProfile {
    return { venue: this.venue, makerFee: 0.001, takerFee: 0.001, requestRateCeiling: 10 };
  }

  getHealth(): VenueHealth {
    return { venue: this.venue, lastSuccessAt: null, lastLatencyMs: null, failures: this.failures, lastError: null };
  }
}

const setup = () => {
  const settings = buildAppSettings({ ARB_TARGET_PAIRS: 'BTC/USDT' });
  const limited = new StubFacade('a', () => Promise.reject(new RateLimitedError('a', 'HTTP 429', 5_000)), 1);
  const healthy = new StubFacade('b', async () => ({
    venue: 'b',
    pair: BTC,
    bid: { price: 100, size: 1 },
    ask: { price: 101, size: 1 },
    capturedAt: 1_000,
    feeSchedule: 'b',
  }));
  const facades = [limited, healthy];
  const orchestrator = new MarketDataOrchestrator(facades, {
    deadlineMs: 1000,
    rateLimitCooldownMs: 60_000,
    clock: () => 1_000,
  });
  const scanner = new OpportunityScanner(
    facades.map((facade) => facade.venueProfile()),
    { minProfitPct: 0.5, maxSlippagePct: 0.2, maxProfitPct: 20, initialCapital: 1000 },
  );
  const universe = new SymbolUniverseService(facades, null, {
    staticPairs: settings.universe.staticPairs,
    quoteAsset: 'USDT',
    startRank: 1,
    endRank: 100,
    refreshMs: 3_600_000,
    maxPairs: 10,
  });
  const dispatcher = new OpportunityDispatcherService([]);
  const scannerService = new ArbitrageScannerService(settings, orchestrator, scanner, universe, dispatcher);
  const controller = new HealthController(scannerService, new VenueRegistryService(facades), orchestrator, dispatcher);
  return { controller, scannerService };
};

describe('HealthController', () => {
  it('answers the liveness probe', () => {
    expect(setup().controller.health()).toEqual({ ok: true });
  });

  it('merges cooldowns into venue health', async () => {
    const { controller, scannerService } = setup();
    await scannerService.runCycle();

    expect(controller.venues()).toEqual({
      ok: true,
      venues: [
        { venue: 'a', lastSuccessAt: null, lastLatencyMs: null, failures: 1, lastError: null, coolingDownUntil: 6_000 },
        { venue: 'b', lastSuccessAt: null, lastLatencyMs: null, failures: 0, lastError: null, coolingDownUntil: null },
      ],
    });
  });

  it('reports the last cycle with notification counters', async () => {
    const { controller, scannerService } = setup();
    await scannerService.runCycle();

    const health = controller.arbitrage();

    expect(health).toMatchObject({
      ok: true,
      enabled: true,
      lastScanAt: 1_000,
      lastCycle: 1,
      opportunities: 0,
      comparisons: 0,
      universeSource: 'static',
      universePairs: 1,
      notifications: { delivered: 0, failed: 0, pending: 0 },
    });
    expect(health.outcomes.a.rateLimited).toBe(1);
    expect(health.outcomes.b.ok).toBe(1);
  });
});
