import { z } from 'zod';
import { SizeUnit } from '@libs/core';
import { MalformedResponseError } from '../errors';
import { PriceLevel, Quote } from '../models';
import { TradingPair } from '../trading-pair';

export const numeric = z.union([z.string(), z.number()]).nullish();

export interface NormalizerOptions {
  sizeUnit: SizeUnit;
}

export interface RawTopOfBook {
  bidPrice: unknown;
  bidSize: unknown;
  askPrice: unknown;
  askSize: unknown;
}

export const parsePayload = <S extends z.ZodTypeAny>(
  venue: string,
  schema: S,
  raw: unknown,
  what: string,
): z.output<S> => {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new MalformedResponseError(venue, `${what}: ${issue?.message ?? 'invalid payload'}${where}`);
  }
  return result.data;
};

const readNumber = (venue: string, field: string, value: unknown): number | null => {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (!Number.isFinite(n) || n < 0) {
    throw new MalformedResponseError(venue, `${field} is not a valid number`);
  }
  return n;
};

// A null or zero price is an empty book side; a price without a size is not.
const readSide = (
  venue: string,
  side: 'bid' | 'ask',
  price: unknown,
  size: unknown,
  sizeUnit: SizeUnit,
): PriceLevel | null => {
  const p = readNumber(venue, `${side} price`, price);
  if (p === null || p === 0) {
    return null;
  }
  const s = readNumber(venue, `${side} size`, size);
  if (s === null) {
    throw new MalformedResponseError(venue, `${side} size missing`);
  }
  return { price: p, size: sizeUnit === 'quote' ? s / p : s };
};

export const buildQuote = (
  venue: string,
  pair: TradingPair,
  book: RawTopOfBook,
  capturedAt: number,
  options: NormalizerOptions,
): Quote => {
  const bid = readSide(venue, 'bid', book.bidPrice, book.bidSize, options.sizeUnit);
  const ask = readSide(venue, 'ask', book.askPrice, book.askSize, options.sizeUnit);
  if (!bid && !ask) {
    throw new MalformedResponseError(venue, `empty book for ${pair.toString()}`);
  }
  if (bid && ask && bid.price > ask.price) {
    throw new MalformedResponseError(venue, `crossed book for ${pair.toString()} (bid ${bid.price} > ask ${ask.price})`);
  }
  return { venue, pair, bid, ask, capturedAt, feeSchedule: venue };
};

/** Builds a pair from venue asset codes, skipping codes that are not plain symbols. */
export const pairFromAssets = (base: string, quote: string): TradingPair | null => TradingPair.tryOf(base, quote);

export const binanceSymbol = (pair: TradingPair): string => `${pair.base}${pair.quote}`;
export const dashSymbol = (pair: TradingPair): string => `${pair.base}-${pair.quote}`;
export const slashSymbol = (pair: TradingPair): string => `${pair.base}/${pair.quote}`;
