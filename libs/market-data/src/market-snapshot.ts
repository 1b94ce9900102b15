import { PriceLevel, Quote } from './models';
import { TradingPair } from './trading-pair';

const freezeLevel = (level: PriceLevel | null): PriceLevel | null => (level ? Object.freeze({ ...level }) : null);

/**
 * Quotes captured within one orchestrator cycle, keyed by (venue, pair).
 * Read-only once constructed; venues that missed the cycle have no entry.
 */
export class MarketSnapshot {
  private readonly quotes: ReadonlyMap<string, Quote>;
  private readonly byPair: ReadonlyMap<string, readonly Quote[]>;

  constructor(
    readonly cycle: number,
    readonly startedAt: number,
    readonly publishedAt: number,
    quotes: Iterable<Quote>,
  ) {
    const entries = new Map<string, Quote>();
    for (const quote of quotes) {
      entries.set(
        MarketSnapshot.key(quote.venue, quote.pair),
        Object.freeze({ ...quote, bid: freezeLevel(quote.bid), ask: freezeLevel(quote.ask) }),
      );
    }
    this.quotes = entries;

    const grouped = new Map<string, Quote[]>();
    for (const quote of entries.values()) {
      const pairKey = quote.pair.toString();
      const bucket = grouped.get(pairKey) ?? [];
      bucket.push(quote);
      grouped.set(pairKey, bucket);
    }
    const frozen = new Map<string, readonly Quote[]>();
    for (const [pairKey, bucket] of [...grouped.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      frozen.set(pairKey, Object.freeze(bucket.sort((a, b) => (a.venue < b.venue ? -1 : a.venue > b.venue ? 1 : 0))));
    }
    this.byPair = frozen;
    Object.freeze(this);
  }

  static key(venue: string, pair: TradingPair): string {
    return `${venue}|${pair.toString()}`;
  }

  get size(): number {
    return this.quotes.size;
  }

  get(venue: string, pair: TradingPair): Quote | undefined {
    return this.quotes.get(MarketSnapshot.key(venue, pair));
  }

  has(venue: string, pair: TradingPair): boolean {
    return this.quotes.has(MarketSnapshot.key(venue, pair));
  }

  /** Pairs in canonical order. */
  pairs(): TradingPair[] {
    return [...this.byPair.values()].map((bucket) => bucket[0].pair);
  }

  /** Quotes for one pair, ordered by venue id. */
  quotesFor(pair: TradingPair): readonly Quote[] {
    return this.byPair.get(pair.toString()) ?? [];
  }

  venues(): string[] {
    return [...new Set([...this.quotes.values()].map((quote) => quote.venue))].sort();
  }

  all(): Quote[] {
    return [...this.quotes.values()];
  }
}
