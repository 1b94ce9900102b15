const QUOTE_ASSETS = ['USDT', 'USDC', 'FDUSD', 'TUSD', 'BUSD', 'DAI', 'USD', 'EUR', 'TRY', 'BTC', 'ETH', 'BNB'];
const BASE_ALIASES: Record<string, string> = {
  XBT: 'BTC',
  XETH: 'ETH',
};

const SYMBOL_PATTERN = /^[A-Z0-9]+$/;

/** Immutable instrument identity. Canonical form is `BASE/QUOTE`. */
export class TradingPair {
  private constructor(
    readonly base: string,
    readonly quote: string,
  ) {
    Object.freeze(this);
  }

  static of(base: string, quote: string): TradingPair {
    const pair = TradingPair.tryOf(base, quote);
    if (!pair) {
      throw new Error(`invalid trading pair ${base}/${quote}`);
    }
    return pair;
  }

  static tryOf(base: string, quote: string): TradingPair | null {
    const rawBase = base.trim().toUpperCase();
    const rawQuote = quote.trim().toUpperCase();
    if (!SYMBOL_PATTERN.test(rawBase) || !SYMBOL_PATTERN.test(rawQuote)) {
      return null;
    }
    const b = BASE_ALIASES[rawBase] ?? rawBase;
    const q = BASE_ALIASES[rawQuote] ?? rawQuote;
    return b === q ? null : new TradingPair(b, q);
  }

  /**
   * Accepts `BTC/USDT`, `BTC-USDT`, `BTC_USDT` and concatenated `BTCUSDT`
   * when the quote is a known quote asset.
   */
  static parse(symbol: string): TradingPair {
    const pair = TradingPair.tryParse(symbol);
    if (!pair) {
      throw new Error(`cannot parse trading pair "${symbol}"`);
    }
    return pair;
  }

  static tryParse(symbol: string): TradingPair | null {
    const raw = symbol.trim().toUpperCase();
    const parts = raw.split(/[/\-_:]/).filter(Boolean);
    if (parts.length === 2 && parts.every((part) => SYMBOL_PATTERN.test(part))) {
      return TradingPair.tryOf(parts[0], parts[1]);
    }
    if (parts.length !== 1 || !SYMBOL_PATTERN.test(raw)) {
      return null;
    }
    for (const quote of QUOTE_ASSETS) {
      if (raw.endsWith(quote) && raw.length > quote.length) {
        return TradingPair.tryOf(raw.slice(0, raw.length - quote.length), quote);
      }
    }
    return null;
  }

  static compare(a: TradingPair, b: TradingPair): number {
    if (a.base !== b.base) return a.base < b.base ? -1 : 1;
    if (a.quote !== b.quote) return a.quote < b.quote ? -1 : 1;
    return 0;
  }

  /** Deduplicates by canonical form and sorts. */
  static uniqueSorted(pairs: Iterable<TradingPair>): TradingPair[] {
    const byKey = new Map<string, TradingPair>();
    for (const pair of pairs) {
      byKey.set(pair.toString(), pair);
    }
    return [...byKey.values()].sort(TradingPair.compare);
  }

  equals(other: TradingPair): boolean {
    return this.base === other.base && this.quote === other.quote;
  }

  toString(): string {
    return `${this.base}/${this.quote}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
