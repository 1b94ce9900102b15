import { AxiosInstance } from 'axios';
import { VenueCredentials } from '@libs/core';
import { RateLimitedError, VenueUnavailableError } from '../errors';
import { FetchOptions, VenueConnector } from '../interfaces';
import { dashSymbol } from '../normalizers/common';
import { TradingPair } from '../trading-pair';
import { envelopeCode, envelopeMessage, hmacSha256Base64, withQuery } from './signing';

const SUCCESS_CODE = '0';
const THROTTLED_CODES = new Set(['50011', '50061']);

export const signOkxRequest = (
  credentials: VenueCredentials,
  method: string,
  pathWithQuery: string,
  body: string,
  timestamp: number,
): Record<string, string> => {
  const isoTimestamp = new Date(timestamp).toISOString();
  return {
    'OK-ACCESS-KEY': credentials.apiKey,
    'OK-ACCESS-SIGN': hmacSha256Base64(
      credentials.apiSecret,
      `${isoTimestamp}${method.toUpperCase()}${pathWithQuery}${body}`,
    ),
    'OK-ACCESS-TIMESTAMP': isoTimestamp,
    'OK-ACCESS-PASSPHRASE': credentials.passphrase ?? '',
  };
};

export class OkxConnector implements VenueConnector {
  constructor(
    readonly venue: string,
    private readonly http: AxiosInstance,
    private readonly credentials: VenueCredentials | null = null,
    private readonly now: () => number = Date.now,
  ) {}

  fetchBookTicker(pair: TradingPair, options: FetchOptions = {}): Promise<unknown> {
    return this.get(withQuery('/api/v5/market/ticker', { instId: dashSymbol(pair) }), options);
  }

  fetchMarkets(options: FetchOptions = {}): Promise<unknown> {
    return this.get(withQuery('/api/v5/public/instruments', { instType: 'SPOT' }), options);
  }

  private async get(pathWithQuery: string, options: FetchOptions): Promise<unknown> {
    const headers = this.credentials ? signOkxRequest(this.credentials, 'GET', pathWithQuery, '', this.now()) : {};
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
