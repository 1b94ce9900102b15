import { Logger } from '@nestjs/common';
import { MalformedResponseError, RateLimitedError } from '../errors';
import { ExchangeFacade } from '../interfaces';
import { MarketSnapshot } from '../market-snapshot';
import { emptyOutcomeCounts, Quote, VenueOutcome, VenueOutcomeCounts } from '../models';
import { TradingPair } from '../trading-pair';
import { AbortedError, raceAbort } from '../utils/abort.util';
import { AdmissionLimiter, Release } from './admission-limiter';
import { VenueCooldown } from './venue-cooldown';

export interface OrchestratorOptions {
  /** hard deadline for one cycle */
  deadlineMs: number;
  /** cooldown used when a rate-limited venue sends no retry-after hint */
  rateLimitCooldownMs: number;
  clock?: () => number;
}

/** Pairs to quote, per venue id. */
export type VenueCoverage = ReadonlyMap<string, readonly TradingPair[]>;

export interface CycleReport {
  snapshot: MarketSnapshot;
  outcomes: Record<string, VenueOutcomeCounts>;
  durationMs: number;
  deadlineHit: boolean;
}

interface VenueLane {
  facade: ExchangeFacade;
  limiter: AdmissionLimiter;
  cooldown: VenueCooldown;
}

interface FetchResult {
  outcome: VenueOutcome;
  quote?: Quote;
}

/**
 * Fans one cycle of quote requests out to every venue at once, each venue behind
 * its own admission limiter, all under one deadline. A slow or failing venue only
 * loses its own entries.
 */
export class MarketDataOrchestrator {
  private readonly logger = new Logger(MarketDataOrchestrator.name);
  private readonly lanes = new Map<string, VenueLane>();
  private readonly clock: () => number;
  private cycle = 0;

  constructor(
    facades: readonly ExchangeFacade[],
    private readonly options: OrchestratorOptions,
  ) {
    this.clock = options.clock ?? Date.now;
    for (const facade of facades) {
      this.lanes.set(facade.venue, {
        facade,
        limiter: AdmissionLimiter.forProfile(facade.venueProfile(), this.clock),
        cooldown: new VenueCooldown(),
      });
    }
  }

  get lastCycle(): number {
    return this.cycle;
  }

  venues(): string[] {
    return [...this.lanes.keys()];
  }

  isCoolingDown(venue: string): boolean {
    return this.lanes.get(venue)?.cooldown.isActive(this.clock()) ?? false;
  }

  getCooldowns(): Record<string, number | null> {
    const now = this.clock();
    const result: Record<string, number | null> = {};
    for (const [venue, lane] of this.lanes) {
      result[venue] = lane.cooldown.coolingUntil(now);
    }
    return result;
  }

  async collect(coverage: VenueCoverage): Promise<CycleReport> {
    this.cycle += 1;
    const cycle = this.cycle;
    const startedAt = this.clock();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.deadlineMs);

    const quotes: Quote[] = [];
    const outcomes: Record<string, VenueOutcomeCounts> = {};
    const tasks: Promise<void>[] = [];

    for (const [venue, lane] of this.lanes) {
      const counts = emptyOutcomeCounts();
      outcomes[venue] = counts;
      for (const pair of coverage.get(venue) ?? []) {
        tasks.push(
          this.fetchOne(lane, pair, controller.signal).then((result) => {
            // anything that lands after the deadline is discarded
            if (result.quote && !controller.signal.aborted) {
              quotes.push(result.quote);
              counts.ok += 1;
              return;
            }
            counts[result.outcome === 'ok' ? 'abandoned' : result.outcome] += 1;
          }),
        );
      }
    }

    try {
      await Promise.all(tasks);
    } finally {
      clearTimeout(timer);
    }

    const deadlineHit = controller.signal.aborted;
    const publishedAt = this.clock();
    const snapshot = new MarketSnapshot(cycle, startedAt, publishedAt, quotes);

    this.logger.log(
      JSON.stringify({
        event: 'market_data_cycle',
        cycle,
        quotes: snapshot.size,
        durationMs: publishedAt - startedAt,
        deadlineHit,
        outcomes,
      }),
    );

    return { snapshot, outcomes, durationMs: publishedAt - startedAt, deadlineHit };
  }

  private async fetchOne(lane: VenueLane, pair: TradingPair, signal: AbortSignal): Promise<FetchResult> {
    const { facade, limiter, cooldown } = lane;
    if (cooldown.isActive(this.clock())) {
      return { outcome: 'skipped' };
    }

    let release: Release | null = null;
    try {
      release = await limiter.acquireSlot(signal);
      if (cooldown.isActive(this.clock())) {
        return { outcome: 'skipped' };
      }
      await limiter.waitForToken(signal);
      if (cooldown.isActive(this.clock())) {
        return { outcome: 'skipped' };
      }

      const quote = await raceAbort(facade.fetchQuote(pair, { signal }), signal);
      return signal.aborted ? { outcome: 'abandoned' } : { outcome: 'ok', quote };
    } catch (error) {
      if (error instanceof AbortedError || signal.aborted) {
        return { outcome: 'abandoned' };
      }
      if (error instanceof RateLimitedError) {
        // a zero or missing hint falls back to the configured window
        const hinted = error.retryAfterMs;
        const cooldownMs = hinted !== null && hinted > 0 ? hinted : this.options.rateLimitCooldownMs;
        cooldown.trip(cooldownMs, this.clock());
        this.logger.warn(
          JSON.stringify({ event: 'venue_rate_limited', venue: facade.venue, pair: pair.toString(), cooldownMs }),
        );
        return { outcome: 'rateLimited' };
      }
      if (error instanceof MalformedResponseError) {
        return { outcome: 'malformed' };
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        JSON.stringify({ event: 'venue_quote_failed', venue: facade.venue, pair: pair.toString(), message }),
      );
      return { outcome: 'unavailable' };
    } finally {
      release?.();
    }
  }
}
