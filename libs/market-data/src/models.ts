import { TradingPair } from './trading-pair';

export interface PriceLevel {
  readonly price: number;
  /** always in base currency */
  readonly size: number;
}

/**
 * Top-of-book for one (venue, pair). A missing side means the venue reported an
 * empty book on that side; when both are present, `bid.price <= ask.price`.
 */
export interface Quote {
  readonly venue: string;
  readonly pair: TradingPair;
  readonly bid: PriceLevel | null;
  readonly ask: PriceLevel | null;
  readonly capturedAt: number;
  /** id of the VenueProfile whose fees apply */
  readonly feeSchedule?: string;
}

export interface VenueProfile {
  readonly venue: string;
  readonly makerFee: number;
  readonly takerFee: number;
  readonly withdrawalFees?: Readonly<Record<string, number>>;
  /** requests per second the venue tolerates */
  readonly requestRateCeiling: number;
}

export interface WithdrawalEstimate {
  readonly asset: string;
  readonly fee: number;
  readonly costPct: number;
  readonly netAfterWithdrawalPct: number;
}

export interface ArbitrageOpportunity {
  readonly pair: TradingPair;
  readonly buyVenue: string;
  readonly sellVenue: string;
  readonly buyPrice: number;
  readonly sellPrice: number;
  readonly grossSpreadPct: number;
  readonly netProfitPct: number;
  readonly realizableSize: number;
  readonly detectedAt: number;
  readonly cycle: number;
  readonly buyFeePct: number;
  readonly sellFeePct: number;
  readonly slippagePct: number;
  /** realizable size bounded by the configured capital */
  readonly tradeSize: number;
  /** quote currency */
  readonly estimatedProfit: number;
  readonly withdrawal?: WithdrawalEstimate;
}

export type VenueOutcome = 'ok' | 'unavailable' | 'rateLimited' | 'malformed' | 'skipped' | 'abandoned';

export type VenueOutcomeCounts = Record<VenueOutcome, number>;

export const emptyOutcomeCounts = (): VenueOutcomeCounts => ({
  ok: 0,
  unavailable: 0,
  rateLimited: 0,
  malformed: 0,
  skipped: 0,
  abandoned: 0,
});

export interface VenueHealth {
  venue: string;
  lastSuccessAt: number | null;
  lastLatencyMs: number | null;
  failures: number;
  lastError: string | null;
  coolingDownUntil?: number | null;
}
