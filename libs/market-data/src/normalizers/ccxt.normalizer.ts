import { z } from 'zod';
import { ResponseNormalizer } from '../interfaces';
import { Quote } from '../models';
import { TradingPair } from '../trading-pair';
import { buildQuote, NormalizerOptions, pairFromAssets, parsePayload } from './common';

const levelSchema = z.array(z.unknown());

const orderBookSchema = z.object({
  bids: z.array(levelSchema),
  asks: z.array(levelSchema),
});

const marketsSchema = z.record(
  z.object({
    base: z.string(),
    quote: z.string(),
    active: z.boolean().nullish(),
    spot: z.boolean().nullish(),
  }),
);

export class CcxtNormalizer implements ResponseNormalizer {
  constructor(
    private readonly venue: string,
    private readonly options: NormalizerOptions = { sizeUnit: 'base' },
  ) {}

  normalizeQuote(pair: TradingPair, raw: unknown, capturedAt: number): Quote {
    const book = parsePayload(this.venue, orderBookSchema, raw, 'order book');
    const [bidPrice, bidSize] = book.bids[0] ?? [];
    const [askPrice, askSize] = book.asks[0] ?? [];
    return buildQuote(this.venue, pair, { bidPrice, bidSize, askPrice, askSize }, capturedAt, this.options);
  }

  normalizeMarkets(raw: unknown): TradingPair[] {
    const markets = parsePayload(this.venue, marketsSchema, raw, 'markets');
    return TradingPair.uniqueSorted(
      Object.values(markets)
        .filter((market) => market.active !== false && market.spot !== false)
        .map((market) => pairFromAssets(market.base, market.quote))
        .filter((pair): pair is TradingPair => pair !== null),
    );
  }
}
