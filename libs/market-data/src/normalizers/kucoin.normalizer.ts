import { z } from 'zod';
import { MalformedResponseError } from '../errors';
import { ResponseNormalizer } from '../interfaces';
import { Quote } from '../models';
import { TradingPair } from '../trading-pair';
import { buildQuote, NormalizerOptions, numeric, pairFromAssets, parsePayload } from './common';

const level1Schema = z.object({
  code: z.string(),
  data: z
    .object({
      time: z.number().optional(),
      price: numeric,
      bestBid: numeric,
      bestBidSize: numeric,
      bestAsk: numeric,
      bestAskSize: numeric,
    })
    .nullable(),
});

const symbolsSchema = z.object({
  code: z.string(),
  data: z.array(
    z.object({
      symbol: z.string(),
      baseCurrency: z.string(),
      quoteCurrency: z.string(),
      enableTrading: z.boolean(),
    }),
  ),
});

export class KucoinNormalizer implements ResponseNormalizer {
  constructor(
    private readonly venue: string,
    private readonly options: NormalizerOptions = { sizeUnit: 'base' },
  ) {}

  normalizeQuote(pair: TradingPair, raw: unknown, capturedAt: number): Quote {
    const payload = parsePayload(this.venue, level1Schema, raw, 'orderbook level1');
    if (!payload.data) {
      throw new MalformedResponseError(this.venue, `no level1 data for ${pair.toString()}`);
    }
    const { bestBid, bestBidSize, bestAsk, bestAskSize } = payload.data;
    return buildQuote(
      this.venue,
      pair,
      { bidPrice: bestBid, bidSize: bestBidSize, askPrice: bestAsk, askSize: bestAskSize },
      capturedAt,
      this.options,
    );
  }

  normalizeMarkets(raw: unknown): TradingPair[] {
    const payload = parsePayload(this.venue, symbolsSchema, raw, 'symbols');
    return TradingPair.uniqueSorted(
      payload.data
        .filter((entry) => entry.enableTrading)
        .map((entry) => pairFromAssets(entry.baseCurrency, entry.quoteCurrency))
        .filter((pair): pair is TradingPair => pair !== null),
    );
  }
}
