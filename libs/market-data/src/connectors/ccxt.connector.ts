import { BadResponse, DDoSProtection, NetworkError, NullResponse, RateLimitExceeded } from 'ccxt';
import { MalformedResponseError, RateLimitedError, VenueUnavailableError } from '../errors';
import { FetchOptions, VenueConnector } from '../interfaces';
import { slashSymbol } from '../normalizers/common';
import { TradingPair } from '../trading-pair';
import { raceAbort } from '../utils/abort.util';

/** The part of a ccxt exchange instance the connector relies on. */
export interface CcxtClient {
  loadMarkets(reload?: boolean): Promise<unknown>;
  fetchOrderBook(symbol: string, limit?: number): Promise<unknown>;
}

export const mapCcxtError = (venue: string, error: unknown): unknown => {
  const message = error instanceof Error ? error.message : 'Unknown error';
  if (error instanceof RateLimitExceeded || error instanceof DDoSProtection) {
    return new RateLimitedError(venue, message);
  }
  if (error instanceof BadResponse || error instanceof NullResponse) {
    return new MalformedResponseError(venue, message);
  }
  if (error instanceof NetworkError) {
    return new VenueUnavailableError(venue, message);
  }
  return error;
};

/**
 * Generic venue backed by a ccxt exchange instance. ccxt calls cannot be cancelled,
 * so an aborted call is abandoned and its late result discarded.
 */
export class CcxtConnector implements VenueConnector {
  constructor(
    readonly venue: string,
    private readonly client: CcxtClient,
    private readonly depth = 5,
  ) {}

  fetchBookTicker(pair: TradingPair, options: FetchOptions = {}): Promise<unknown> {
    return this.call(() => this.client.fetchOrderBook(slashSymbol(pair), this.depth), options);
  }

  fetchMarkets(options: FetchOptions = {}): Promise<unknown> {
    return this.call(() => this.client.loadMarkets(true), options);
  }

  private async call(fn: () => Promise<unknown>, options: FetchOptions): Promise<unknown> {
    try {
      return await raceAbort(fn(), options.signal);
    } catch (error) {
      throw mapCcxtError(this.venue, error);
    }
  }
}
