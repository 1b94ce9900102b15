import { z } from 'zod';
import { MalformedResponseError } from '../errors';
import { ResponseNormalizer } from '../interfaces';
import { Quote } from '../models';
import { TradingPair } from '../trading-pair';
import { binanceSymbol, buildQuote, NormalizerOptions, numeric, pairFromAssets, parsePayload } from './common';

const bookTickerSchema = z.object({
  symbol: z.string(),
  bidPrice: numeric,
  bidQty: numeric,
  askPrice: numeric,
  askQty: numeric,
});

const exchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      status: z.string(),
      baseAsset: z.string(),
      quoteAsset: z.string(),
    }),
  ),
});

export class BinanceNormalizer implements ResponseNormalizer {
  constructor(
    private readonly venue: string,
    private readonly options: NormalizerOptions = { sizeUnit: 'base' },
  ) {}

  normalizeQuote(pair: TradingPair, raw: unknown, capturedAt: number): Quote {
    const payload = parsePayload(this.venue, bookTickerSchema, raw, 'bookTicker');
    if (payload.symbol.toUpperCase() !== binanceSymbol(pair)) {
      throw new MalformedResponseError(this.venue, `bookTicker for ${payload.symbol}, expected ${binanceSymbol(pair)}`);
    }
    return buildQuote(
      this.venue,
      pair,
      { bidPrice: payload.bidPrice, bidSize: payload.bidQty, askPrice: payload.askPrice, askSize: payload.askQty },
      capturedAt,
      this.options,
    );
  }

  normalizeMarkets(raw: unknown): TradingPair[] {
    const payload = parsePayload(this.venue, exchangeInfoSchema, raw, 'exchangeInfo');
    return TradingPair.uniqueSorted(
      payload.symbols
        .filter((entry) => entry.status === 'TRADING')
        .map((entry) => pairFromAssets(entry.baseAsset, entry.quoteAsset))
        .filter((pair): pair is TradingPair => pair !== null),
    );
  }
}
