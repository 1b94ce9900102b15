import { ArbitrageOpportunity } from '@libs/market-data';

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');

const formatPct = (value: number): string => `${value.toFixed(2)}%`;

export const formatPrice = (value: number): string => {
  if (value >= 1000) return value.toFixed(2);
  if (value >= 1) return value.toFixed(4);
  return value.toPrecision(4);
};

const formatSize = (value: number): string => (value >= 1 ? value.toFixed(4) : value.toPrecision(4));

export const formatOpportunityMessage = (opportunity: ArbitrageOpportunity): string => {
  const pair = opportunity.pair.toString();
  const lines = [
    `💹 <b>Arbitrage ${escapeHtml(pair)}</b>`,
    `<b>Buy:</b> ${escapeHtml(opportunity.buyVenue)} @ ${formatPrice(opportunity.buyPrice)}`,
    `<b>Sell:</b> ${escapeHtml(opportunity.sellVenue)} @ ${formatPrice(opportunity.sellPrice)}`,
    `<b>Gross spread:</b> ${formatPct(opportunity.grossSpreadPct)}`,
    `<b>Net profit:</b> ${formatPct(opportunity.netProfitPct)}`,
    `<b>Size:</b> ${formatSize(opportunity.tradeSize)} ${escapeHtml(opportunity.pair.base)} (book ${formatSize(opportunity.realizableSize)})`,
    `<b>Est. profit:</b> ${opportunity.estimatedProfit.toFixed(2)} ${escapeHtml(opportunity.pair.quote)}`,
  ];

  if (opportunity.withdrawal) {
    lines.push(
      `<b>After withdrawal:</b> ${formatPct(opportunity.withdrawal.netAfterWithdrawalPct)} (fee ${opportunity.withdrawal.fee} ${escapeHtml(opportunity.withdrawal.asset)})`,
    );
  }

  lines.push(`<b>Time:</b> ${new Date(opportunity.detectedAt).toISOString()}`);
  return lines.join('\n');
};
