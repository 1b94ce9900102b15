import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { APP_SETTINGS, AppSettings } from '@libs/core';
import {
  MarketDataOrchestrator,
  OpportunityScanner,
  ScanReport,
  SymbolUniverseService,
  VenueOutcomeCounts,
} from '@libs/market-data';
import { OpportunityDispatcherService } from '../notifications/opportunity-dispatcher.service';

export interface ArbitrageHealth {
  enabled: boolean;
  lastScanAt: number | null;
  lastCycle: number | null;
  lastDurationMs: number | null;
  deadlineHit: boolean;
  opportunities: number;
  comparisons: number;
  suspicious: number;
  skippedTicks: number;
  universeSource: string | null;
  universePairs: number;
  outcomes: Record<string, VenueOutcomeCounts>;
}

/**
 * Drives collect → scan → notify on a fixed interval. Cycles never overlap: a tick
 * that fires while one is running is skipped.
 */
@Injectable()
export class ArbitrageScannerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ArbitrageScannerService.name);
  private timer?: NodeJS.Timeout;
  private running = false;
  private skippedTicks = 0;
  private lastScanAt: number | null = null;
  private lastCycle: number | null = null;
  private lastDurationMs: number | null = null;
  private lastDeadlineHit = false;
  private lastReport: ScanReport | null = null;
  private lastOutcomes: Record<string, VenueOutcomeCounts> = {};

  constructor(
    @Inject(APP_SETTINGS) private readonly settings: AppSettings,
    private readonly orchestrator: MarketDataOrchestrator,
    private readonly scanner: OpportunityScanner,
    private readonly universe: SymbolUniverseService,
    private readonly dispatcher: OpportunityDispatcherService,
  ) {}

  onModuleInit(): void {
    if (!this.settings.cycle.enabled) {
      this.logger.log('Arbitrage scanning is disabled');
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.settings.cycle.scanIntervalMs);
    void this.tick();
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
    }
  }

  async tick(): Promise<void> {
    if (this.running) {
      this.skippedTicks += 1;
      this.logger.warn(JSON.stringify({ event: 'arb_tick_skipped', skippedTicks: this.skippedTicks }));
      return;
    }
    this.running = true;
    try {
      await this.runCycle();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(JSON.stringify({ event: 'arb_cycle_failed', message }));
    } finally {
      this.running = false;
    }
  }

  async runCycle(): Promise<ScanReport> {
    const coverage = await this.universe.getCoverage();
    const cycle = await this.orchestrator.collect(coverage);
    const report = this.scanner.evaluate(cycle.snapshot);

    this.dispatcher.dispatch(report.opportunities);

    this.lastScanAt = cycle.snapshot.publishedAt;
    this.lastCycle = cycle.snapshot.cycle;
    this.lastDurationMs = cycle.durationMs;
    this.lastDeadlineHit = cycle.deadlineHit;
    this.lastOutcomes = cycle.outcomes;
    this.lastReport = report;

    this.logger.log(
      JSON.stringify({
        event: 'arb_scan_completed',
        cycle: report.cycle,
        quotes: cycle.snapshot.size,
        comparisons: report.comparisons,
        favorable: report.favorable,
        opportunities: report.opportunities.length,
        suspicious: report.suspicious.length,
        best: report.opportunities[0]
          ? {
              pair: report.opportunities[0].pair.toString(),
              netProfitPct: Number(report.opportunities[0].netProfitPct.toFixed(4)),
            }
          : null,
      }),
    );
    return report;
  }

  getHealth(): ArbitrageHealth {
    const universe = this.universe.getCurrent();
    return {
      enabled: this.settings.cycle.enabled,
      lastScanAt: this.lastScanAt,
      lastCycle: this.lastCycle,
      lastDurationMs: this.lastDurationMs,
      deadlineHit: this.lastDeadlineHit,
      opportunities: this.lastReport?.opportunities.length ?? 0,
      comparisons: this.lastReport?.comparisons ?? 0,
      suspicious: this.lastReport?.suspicious.length ?? 0,
      skippedTicks: this.skippedTicks,
      universeSource: universe?.source ?? null,
      universePairs: universe?.universe.length ?? 0,
      outcomes: this.lastOutcomes,
    };
  }
}
