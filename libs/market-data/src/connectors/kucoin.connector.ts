import { AxiosInstance } from 'axios';
import { VenueCredentials } from '@libs/core';
import { RateLimitedError, VenueUnavailableError } from '../errors';
import { FetchOptions, VenueConnector } from '../interfaces';
import { dashSymbol } from '../normalizers/common';
import { TradingPair } from '../trading-pair';
import { envelopeCode, envelopeMessage, hmacSha256Base64, withQuery } from './signing';

const SUCCESS_CODE = '200000';
const THROTTLED_CODES = new Set(['429000']);

export const signKucoinRequest = (
  credentials: VenueCredentials,
  method: string,
  pathWithQuery: string,
  body: string,
  timestamp: number,
): Record<string, string> => ({
  'KC-API-KEY': credentials.apiKey,
  'KC-API-SIGN': hmacSha256Base64(credentials.apiSecret, `${timestamp}${method.toUpperCase()}${pathWithQuery}${body}`),
  'KC-API-TIMESTAMP': String(timestamp),
  'KC-API-PASSPHRASE': hmacSha256Base64(credentials.apiSecret, credentials.passphrase ?? ''),
  'KC-API-KEY-VERSION': '2',
});

export class KucoinConnector implements VenueConnector {
  constructor(
    readonly venue: string,
    private readonly http: AxiosInstance,
    private readonly credentials: VenueCredentials | null = null,
    private readonly now: () => number = Date.now,
  ) {}

  fetchBookTicker(pair: TradingPair, options: FetchOptions = {}): Promise<unknown> {
    return this.get(withQuery('/api/v1/market/orderbook/level1', { symbol: dashSymbol(pair) }), options);
  }

  fetchMarkets(options: FetchOptions = {}): Promise<unknown> {
    return this.get('/api/v2/symbols', options);
  }

  private async get(pathWithQuery: string, options: FetchOptions): Promise<unknown> {
    const headers = this.credentials
      ? signKucoinRequest(this.credentials, 'GET', pathWithQuery, '', this.now())
      : {};
    const response = await this.http.get<unknown>(pathWithQuery, { headers, signal: options.signal });
    const code = envelopeCode(response.data);
    if (code !== null && code !== SUCCESS_CODE) {
      const message = `code ${code}: ${envelopeMessage(response.data)}`;
      if (THROTTLED_CODES.has(code)) {
        throw new RateLimitedError(this.venue, message);
      }
      throw new VenueUnavailableError(this.venue, message);
    }
    return response.data;
  }
}
