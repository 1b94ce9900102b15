/** All percentages are in percent units (1.5 = 1.5%); fees are fractions (0.001 = 0.1%). */

export const grossSpreadPct = (buyPrice: number, sellPrice: number): number =>
  ((sellPrice - buyPrice) / buyPrice) * 100;

export const netProfitPct = (
  grossPct: number,
  buyTakerFee: number,
  sellTakerFee: number,
  slippagePct: number,
): number => grossPct - (buyTakerFee * 100 + sellTakerFee * 100) - slippagePct;

export type ProfitVerdict = 'below_threshold' | 'accepted' | 'suspicious';

/** Float error tolerated at the band edges, in percent units. */
export const PROFIT_TOLERANCE_PCT = 1e-9;

export const classifyNetProfit = (netPct: number, minProfitPct: number, maxProfitPct: number): ProfitVerdict => {
  if (netPct < minProfitPct - PROFIT_TOLERANCE_PCT) return 'below_threshold';
  if (netPct > maxProfitPct + PROFIT_TOLERANCE_PCT) return 'suspicious';
  return 'accepted';
};

/** Base-currency size the configured capital can buy, bounded by book depth. */
export const capitalBoundedSize = (realizableSize: number, buyPrice: number, initialCapital: number): number =>
  Math.min(realizableSize, initialCapital / buyPrice);
