import { ArbitrageOpportunity, Quote, VenueHealth, VenueProfile } from './models';
import { TradingPair } from './trading-pair';

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Transport and authentication for one venue. Returns the raw payload and never
 * interprets it; throws whatever the transport throws.
 */
export interface VenueConnector {
  readonly venue: string;
  fetchBookTicker(pair: TradingPair, options?: FetchOptions): Promise<unknown>;
  fetchMarkets(options?: FetchOptions): Promise<unknown>;
}

/** Pure mapping from a venue payload to the internal model. Throws MalformedResponseError. */
export interface ResponseNormalizer {
  normalizeQuote(pair: TradingPair, raw: unknown, capturedAt: number): Quote;
  normalizeMarkets(raw: unknown): TradingPair[];
}

/** The uniform capability every venue integration exposes. */
export interface ExchangeFacade {
  readonly venue: string;
  fetchQuote(pair: TradingPair, options?: FetchOptions): Promise<Quote>;
  fetchTickerUniverse(options?: FetchOptions): Promise<TradingPair[]>;
  venueProfile(): VenueProfile;
  getHealth(): VenueHealth;
}

export interface OpportunitySink {
  readonly name: string;
  notify(opportunity: ArbitrageOpportunity): Promise<void>;
}

export interface AssetRankingSource {
  /** Asset symbols ranked within [startRank, endRank], best rank first. */
  getRankedAssets(startRank: number, endRank: number, options?: FetchOptions): Promise<string[]>;
}
