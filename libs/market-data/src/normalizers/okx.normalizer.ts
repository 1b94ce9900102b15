import { z } from 'zod';
import { MalformedResponseError } from '../errors';
import { ResponseNormalizer } from '../interfaces';
import { Quote } from '../models';
import { TradingPair } from '../trading-pair';
import { buildQuote, dashSymbol, NormalizerOptions, numeric, pairFromAssets, parsePayload } from './common';

const tickerSchema = z.object({
  code: z.string(),
  data: z.array(
    z.object({
      instId: z.string(),
      bidPx: numeric,
      bidSz: numeric,
      askPx: numeric,
      askSz: numeric,
      ts: numeric,
    }),
  ),
});

const instrumentsSchema = z.object({
  code: z.string(),
  data: z.array(
    z.object({
      instId: z.string(),
      baseCcy: z.string(),
      quoteCcy: z.string(),
      state: z.string(),
    }),
  ),
});

export class OkxNormalizer implements ResponseNormalizer {
  constructor(
    private readonly venue: string,
    private readonly options: NormalizerOptions = { sizeUnit: 'base' },
  ) {}

  normalizeQuote(pair: TradingPair, raw: unknown, capturedAt: number): Quote {
    const payload = parsePayload(this.venue, tickerSchema, raw, 'ticker');
    const ticker = payload.data.find((entry) => entry.instId.toUpperCase() === dashSymbol(pair));
    if (!ticker) {
      throw new MalformedResponseError(this.venue, `ticker for ${dashSymbol(pair)} missing`);
    }
    return buildQuote(
      this.venue,
      pair,
      { bidPrice: ticker.bidPx, bidSize: ticker.bidSz, askPrice: ticker.askPx, askSize: ticker.askSz },
      capturedAt,
      this.options,
    );
  }

  normalizeMarkets(raw: unknown): TradingPair[] {
    const payload = parsePayload(this.venue, instrumentsSchema, raw, 'instruments');
    return TradingPair.uniqueSorted(
      payload.data
        .filter((entry) => entry.state === 'live')
        .map((entry) => pairFromAssets(entry.baseCcy, entry.quoteCcy))
        .filter((pair): pair is TradingPair => pair !== null),
    );
  }
}
