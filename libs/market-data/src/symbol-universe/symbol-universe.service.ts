import { Logger } from '@nestjs/common';
import { ConfigurationError } from '@libs/core';
import { AssetRankingSource, ExchangeFacade } from '../interfaces';
import { VenueCoverage } from '../orchestrator/market-data-orchestrator';
import { TradingPair } from '../trading-pair';
import { raceAbort } from '../utils/abort.util';

export interface SymbolUniverseOptions {
  staticPairs: readonly string[];
  quoteAsset: string;
  startRank: number;
  endRank: number;
  refreshMs: number;
  maxPairs: number;
  /** Bound on one refresh; listings still pending are treated as failed. */
  deadlineMs?: number;
  clock?: () => number;
}

export type UniverseSource = 'static' | 'ranking' | 'last_known' | 'fallback';

export interface UniverseResolution {
  universe: TradingPair[];
  coverage: VenueCoverage;
  source: UniverseSource;
  resolvedAt: number;
}

export const FALLBACK_PAIRS: readonly string[] = ['BTC/USDT', 'ETH/USDT'];
export const DEFAULT_REFRESH_DEADLINE_MS = 10_000;

/**
 * Decides which pairs are scanned and which of them each venue can quote.
 * Failures never empty the universe: the last known one is kept.
 */
export class SymbolUniverseService {
  private readonly logger = new Logger(SymbolUniverseService.name);
  private readonly clock: () => number;
  private readonly staticPairs: TradingPair[] | null;
  private readonly lastCoverage = new Map<string, TradingPair[]>();
  private lastRankedUniverse: TradingPair[] | null = null;
  private current: UniverseResolution | null = null;

  constructor(
    private readonly facades: readonly ExchangeFacade[],
    private readonly ranking: AssetRankingSource | null,
    private readonly options: SymbolUniverseOptions,
  ) {
    this.clock = options.clock ?? Date.now;
    if (options.staticPairs.length > 0) {
      this.staticPairs = TradingPair.uniqueSorted(
        options.staticPairs.map((symbol) => {
          const pair = TradingPair.tryParse(symbol);
          if (!pair) {
            throw new ConfigurationError(`invalid pair "${symbol}"`, 'ARB_TARGET_PAIRS');
          }
          return pair;
        }),
      );
    } else if (!ranking) {
      throw new ConfigurationError('a ranking source is required without a static pair list', 'CMC_API_KEY');
    } else {
      this.staticPairs = null;
    }
  }

  getCurrent(): UniverseResolution | null {
    return this.current;
  }

  /** Current coverage, refreshed when older than the refresh interval. */
  async getCoverage(): Promise<VenueCoverage> {
    const current = this.current;
    if (current && this.clock() - current.resolvedAt < this.options.refreshMs) {
      return current.coverage;
    }
    return (await this.refresh()).coverage;
  }

  async refresh(): Promise<UniverseResolution> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.deadlineMs ?? DEFAULT_REFRESH_DEADLINE_MS);
    try {
      return await this.resolve(controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private async resolve(signal: AbortSignal): Promise<UniverseResolution> {
    const { universe, source } = await this.resolveUniverse(signal);
    const entries = await Promise.all(
      this.facades.map(async (facade): Promise<[string, TradingPair[]]> => [
        facade.venue,
        await this.resolveVenueCoverage(facade, universe, signal),
      ]),
    );

    const resolution: UniverseResolution = {
      universe,
      coverage: new Map(entries),
      source,
      resolvedAt: this.clock(),
    };
    this.current = resolution;

    this.logger.log(
      JSON.stringify({
        event: 'universe_resolved',
        source,
        pairs: universe.length,
        coverage: Object.fromEntries(entries.map(([venue, pairs]) => [venue, pairs.length])),
      }),
    );
    return resolution;
  }

  private async resolveUniverse(signal: AbortSignal): Promise<{ universe: TradingPair[]; source: UniverseSource }> {
    if (this.staticPairs) {
      return { universe: this.staticPairs, source: 'static' };
    }
    if (!this.ranking) {
      return { universe: FALLBACK_PAIRS.map((symbol) => TradingPair.parse(symbol)), source: 'fallback' };
    }

    try {
      const assets = await raceAbort(
        this.ranking.getRankedAssets(this.options.startRank, this.options.endRank, { signal }),
        signal,
      );
      const pairs = assets
        .map((asset) => TradingPair.tryOf(asset, this.options.quoteAsset))
        .filter((pair): pair is TradingPair => pair !== null)
        .slice(0, this.options.maxPairs);
      if (pairs.length === 0) {
        throw new Error('ranking returned no usable assets');
      }
      const universe = TradingPair.uniqueSorted(pairs);
      this.lastRankedUniverse = universe;
      return { universe, source: 'ranking' };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(JSON.stringify({ event: 'universe_ranking_failed', message }));
      if (this.lastRankedUniverse) {
        return { universe: this.lastRankedUniverse, source: 'last_known' };
      }
      return { universe: FALLBACK_PAIRS.map((symbol) => TradingPair.parse(symbol)), source: 'fallback' };
    }
  }

  private async resolveVenueCoverage(
    facade: ExchangeFacade,
    universe: TradingPair[],
    signal: AbortSignal,
  ): Promise<TradingPair[]> {
    try {
      const listed = await raceAbort(facade.fetchTickerUniverse({ signal }), signal);
      const supported = new Set(listed.map((pair) => pair.toString()));
      const covered = universe.filter((pair) => supported.has(pair.toString()));
      this.lastCoverage.set(facade.venue, covered);
      return covered;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(JSON.stringify({ event: 'universe_venue_failed', venue: facade.venue, message }));
      const previous = this.lastCoverage.get(facade.venue);
      if (!previous) {
        return universe;
      }
      // keep last known support, restricted to pairs still in the universe
      const inUniverse = new Set(universe.map((pair) => pair.toString()));
      return previous.filter((pair) => inUniverse.has(pair.toString()));
    }
  }
}
