import { AxiosInstance } from 'axios';
import { VenueCredentials } from '@libs/core';
import { FetchOptions, VenueConnector } from '../interfaces';
import { binanceSymbol } from '../normalizers/common';
import { TradingPair } from '../trading-pair';

/**
 * Spot market data. Public endpoints; the API key header is attached when configured
 * so requests count against the account's limits rather than the IP's.
 */
export class BinanceConnector implements VenueConnector {
  constructor(
    readonly venue: string,
    private readonly http: AxiosInstance,
    private readonly credentials: VenueCredentials | null = null,
  ) {}

  async fetchBookTicker(pair: TradingPair, options: FetchOptions = {}): Promise<unknown> {
    const response = await this.http.get<unknown>('/api/v3/ticker/bookTicker', {
      params: { symbol: binanceSymbol(pair) },
      headers: this.authHeaders(),
      signal: options.signal,
    });
    return response.data;
  }

  async fetchMarkets(options: FetchOptions = {}): Promise<unknown> {
    const response = await this.http.get<unknown>('/api/v3/exchangeInfo', {
      params: { permissions: 'SPOT' },
      headers: this.authHeaders(),
      signal: options.signal,
    });
    return response.data;
  }

  private authHeaders(): Record<string, string> {
    return this.credentials ? { 'X-MBX-APIKEY': this.credentials.apiKey } : {};
  }
}
