import { Logger } from '@nestjs/common';
import { WithdrawalFeeMode } from '@libs/core';
import { MarketSnapshot } from '../market-snapshot';
import { ArbitrageOpportunity, Quote, VenueProfile, WithdrawalEstimate } from '../models';
import { TradingPair } from '../trading-pair';
import { capitalBoundedSize, classifyNetProfit, grossSpreadPct, netProfitPct } from './profitability';

export interface ScannerOptions {
  minProfitPct: number;
  /** applied once per round trip */
  maxSlippagePct: number;
  maxProfitPct: number;
  initialCapital: number;
  /** quotes older than this relative to the snapshot's publish time are ignored */
  maxQuoteAgeMs?: number;
  withdrawalFees?: WithdrawalFeeMode;
}

export interface SuspiciousSpread {
  pair: TradingPair;
  buyVenue: string;
  sellVenue: string;
  netProfitPct: number;
}

export interface ScanReport {
  cycle: number;
  opportunities: ArbitrageOpportunity[];
  /** ordered venue pairs with a usable ask and bid */
  comparisons: number;
  /** comparisons where the sell bid was above the buy ask */
  favorable: number;
  suspicious: SuspiciousSpread[];
}

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const compareOpportunities = (a: ArbitrageOpportunity, b: ArbitrageOpportunity): number =>
  b.netProfitPct - a.netProfitPct ||
  b.realizableSize - a.realizableSize ||
  compareText(a.pair.toString(), b.pair.toString()) ||
  compareText(a.buyVenue, b.buyVenue) ||
  compareText(a.sellVenue, b.sellVenue);

/**
 * Compares every ordered (buy venue, sell venue) pair per instrument in a snapshot.
 * Pure over the snapshot: scanning it again yields the same list.
 */
export class OpportunityScanner {
  private readonly logger = new Logger(OpportunityScanner.name);
  private readonly profiles: ReadonlyMap<string, VenueProfile>;

  constructor(
    profiles: Iterable<VenueProfile>,
    private readonly options: ScannerOptions,
  ) {
    this.profiles = new Map([...profiles].map((profile) => [profile.venue, profile]));
  }

  scan(snapshot: MarketSnapshot): ArbitrageOpportunity[] {
    return this.evaluate(snapshot).opportunities;
  }

  evaluate(snapshot: MarketSnapshot): ScanReport {
    const opportunities: ArbitrageOpportunity[] = [];
    const suspicious: SuspiciousSpread[] = [];
    let comparisons = 0;
    let favorable = 0;

    for (const pair of snapshot.pairs()) {
      const quotes = snapshot.quotesFor(pair).filter((quote) => this.isUsable(quote, snapshot));
      if (quotes.length < 2) {
        continue;
      }

      for (const buy of quotes) {
        for (const sell of quotes) {
          if (buy.venue === sell.venue || !buy.ask || !sell.bid) {
            continue;
          }
          comparisons += 1;
          if (sell.bid.price <= buy.ask.price) {
            continue;
          }
          favorable += 1;

          const opportunity = this.price(pair, buy, sell, snapshot);
          if (!opportunity) {
            continue;
          }
          const verdict = classifyNetProfit(
            opportunity.netProfitPct,
            this.options.minProfitPct,
            this.options.maxProfitPct,
          );
          if (verdict === 'accepted') {
            opportunities.push(opportunity);
          } else if (verdict === 'suspicious') {
            suspicious.push({
              pair,
              buyVenue: buy.venue,
              sellVenue: sell.venue,
              netProfitPct: opportunity.netProfitPct,
            });
            this.logger.warn(
              JSON.stringify({
                event: 'arb_suspicious_spread',
                cycle: snapshot.cycle,
                pair: pair.toString(),
                buyVenue: buy.venue,
                sellVenue: sell.venue,
                buyPrice: opportunity.buyPrice,
                sellPrice: opportunity.sellPrice,
                netProfitPct: opportunity.netProfitPct,
              }),
            );
          }
        }
      }
    }

    opportunities.sort(compareOpportunities);
    return { cycle: snapshot.cycle, opportunities, comparisons, favorable, suspicious };
  }

  private isUsable(quote: Quote, snapshot: MarketSnapshot): boolean {
    if (!this.profiles.has(quote.feeSchedule ?? quote.venue)) {
      return false;
    }
    const { maxQuoteAgeMs } = this.options;
    return maxQuoteAgeMs === undefined || snapshot.publishedAt - quote.capturedAt <= maxQuoteAgeMs;
  }

  private price(pair: TradingPair, buy: Quote, sell: Quote, snapshot: MarketSnapshot): ArbitrageOpportunity | null {
    const buyProfile = this.profiles.get(buy.feeSchedule ?? buy.venue);
    const sellProfile = this.profiles.get(sell.feeSchedule ?? sell.venue);
    if (!buy.ask || !sell.bid || !buyProfile || !sellProfile) {
      return null;
    }

    const buyPrice = buy.ask.price;
    const sellPrice = sell.bid.price;
    const gross = grossSpreadPct(buyPrice, sellPrice);
    const net = netProfitPct(gross, buyProfile.takerFee, sellProfile.takerFee, this.options.maxSlippagePct);
    const realizableSize = Math.min(buy.ask.size, sell.bid.size);
    const tradeSize = capitalBoundedSize(realizableSize, buyPrice, this.options.initialCapital);
    const withdrawal =
      this.options.withdrawalFees === 'report' ? this.estimateWithdrawal(pair, buyProfile, tradeSize, net) : null;

    return Object.freeze({
      pair,
      buyVenue: buy.venue,
      sellVenue: sell.venue,
      buyPrice,
      sellPrice,
      grossSpreadPct: gross,
      netProfitPct: net,
      realizableSize,
      detectedAt: snapshot.publishedAt,
      cycle: snapshot.cycle,
      buyFeePct: buyProfile.takerFee * 100,
      sellFeePct: sellProfile.takerFee * 100,
      slippagePct: this.options.maxSlippagePct,
      tradeSize,
      estimatedProfit: (tradeSize * buyPrice * net) / 100,
      ...(withdrawal ? { withdrawal } : {}),
    });
  }

  /** Moving the bought asset off the buy venue; reported beside net profit, never folded into it. */
  private estimateWithdrawal(
    pair: TradingPair,
    buyProfile: VenueProfile,
    tradeSize: number,
    net: number,
  ): WithdrawalEstimate | null {
    const fee = buyProfile.withdrawalFees?.[pair.base];
    if (fee === undefined || tradeSize <= 0) {
      return null;
    }
    const costPct = (fee / tradeSize) * 100;
    return Object.freeze({ asset: pair.base, fee, costPct, netAfterWithdrawalPct: net - costPct });
  }
}
