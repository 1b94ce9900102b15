import axios, { AxiosError, AxiosHeaders, InternalAxiosRequestConfig } from 'axios';
import crypto from 'crypto';
import { NetworkError, RateLimitExceeded } from 'ccxt';
import { describe, expect, it } from 'vitest';
import { VenueSettings } from '@libs/core';
import {
  AbortedError,
  BinanceConnector,
  BinanceNormalizer,
  CcxtClient,
  CcxtConnector,
  createVenueFacade,
  FetchOptions,
  KucoinConnector,
  MalformedResponseError,
  OkxConnector,
  RateLimitedError,
  signKucoinRequest,
  signOkxRequest,
  TradingPair,
  VenueConnector,
  VenueExchangeFacade,
  VenueProfile,
  VenueUnavailableError,
} from '@libs/market-data';

const BTC_USDT = TradingPair.of('BTC', 'USDT');
const PROFILE: VenueProfile = { venue: 'binance', makerFee: 0.001, takerFee: 0.001, requestRateCeiling: 10 };
const CREDENTIALS = { apiKey: 'test-key', apiSecret: 'test-secret', passphrase: 'test-passphrase' };

const hmac = (payload: string): string =>
  crypto.createHmac('sha256', 'test-secret').update(payload).digest('base64');

class FakeConnector implements VenueConnector {
  readonly venue = 'binance';
  bookTicker: () => Promise<unknown> = async () => ({});
  markets: () => Promise<unknown> = async () => ({ symbols: [] });
  lastOptions: FetchOptions | null = null;

  fetchBookTicker(_pair: TradingPair, options: FetchOptions = {}): Promise<unknown> {
    this.lastOptions = options;
    return this.bookTicker();
  }

  fetchMarkets(options: FetchOptions = {}): Promise<unknown> {
    this.lastOptions = options;
    return this.markets();
  }
}

interface Recorded {
  url: string | undefined;
  headers: AxiosHeaders;
}

/** axios instance answered in process; `reply` returns the body or throws. */
const stubHttp = (reply: (config: InternalAxiosRequestConfig) => unknown, recorded: Recorded[] = []) =>
  axios.create({
    baseURL: 'https://venue.test',
    adapter: async (config) => {
      recorded.push({ url: config.url, headers: config.headers });
      return { data: reply(config), status: 200, statusText: 'OK', headers: {}, config };
    },
  });

describe('VenueExchangeFacade', () => {
  it('normalizes a quote and records latency', async () => {
    let now = 1000;
    const connector = new FakeConnector();
    connector.bookTicker = async () => {
      now += 25;
      return { symbol: 'BTCUSDT', bidPrice: '100', bidQty: '1', askPrice: '101', askQty: '2' };
    };
    const facade = new VenueExchangeFacade(connector, new BinanceNormalizer('binance'), PROFILE, () => now);
    const signal = new AbortController().signal;

    const quote = await facade.fetchQuote(BTC_USDT, { signal });

    expect(connector.lastOptions?.signal).toBe(signal);
    expect(quote.capturedAt).toBe(1025);
    expect(quote.ask).toEqual({ price: 101, size: 2 });
    expect(facade.getHealth()).toEqual({
      venue: 'binance',
      lastSuccessAt: 1025,
      lastLatencyMs: 25,
      failures: 0,
      lastError: null,
    });
  });

  it('converts transport failures into venue errors', async () => {
    const connector = new FakeConnector();
    connector.bookTicker = async () => {
      const config = { headers: new AxiosHeaders() };
      throw new AxiosError('Too Many Requests', 'ERR_BAD_REQUEST', config, null, {
        data: {},
        status: 429,
        statusText: 'Too Many Requests',
        headers: { 'retry-after': '1' },
        config,
      });
    };
    const facade = new VenueExchangeFacade(connector, new BinanceNormalizer('binance'), PROFILE, () => 0);

    await expect(facade.fetchQuote(BTC_USDT)).rejects.toBeInstanceOf(RateLimitedError);
    expect(facade.getHealth().failures).toBe(1);
    expect(facade.getHealth().lastError).toBe('binance: HTTP 429');
  });

  it('surfaces normalizer rejections as malformed', async () => {
    const connector = new FakeConnector();
    connector.bookTicker = async () => ({ symbol: 'BTCUSDT' });
    const facade = new VenueExchangeFacade(connector, new BinanceNormalizer('binance'), PROFILE, () => 0);

    await expect(facade.fetchQuote(BTC_USDT)).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('lists the venue ticker universe', async () => {
    const connector = new FakeConnector();
    connector.markets = async () => ({
      symbols: [{ symbol: 'ETHBTC', status: 'TRADING', baseAsset: 'ETH', quoteAsset: 'BTC' }],
    });
    const facade = new VenueExchangeFacade(connector, new BinanceNormalizer('binance'), PROFILE, () => 0);

    expect((await facade.fetchTickerUniverse()).map(String)).toEqual(['ETH/BTC']);
    expect(facade.venueProfile()).toBe(PROFILE);
  });
});

describe('request signing', () => {
  it('signs kucoin requests with a signed passphrase', () => {
    const path = '/api/v1/market/orderbook/level1?symbol=BTC-USDT';
    expect(signKucoinRequest(CREDENTIALS, 'get', path, '', 1700000000000)).toEqual({
      'KC-API-KEY': 'test-key',
      'KC-API-SIGN': hmac(`1700000000000GET${path}`),
      'KC-API-TIMESTAMP': '1700000000000',
      'KC-API-PASSPHRASE': hmac('test-passphrase'),
      'KC-API-KEY-VERSION': '2',
    });
  });

  it('signs okx requests over an ISO timestamp', () => {
    const path = '/api/v5/market/ticker?instId=BTC-USDT';
    expect(signOkxRequest(CREDENTIALS, 'GET', path, '', 1700000000000)).toEqual({
      'OK-ACCESS-KEY': 'test-key',
      'OK-ACCESS-SIGN': hmac(`2023-11-14T22:13:20.000ZGET${path}`),
      'OK-ACCESS-TIMESTAMP': '2023-11-14T22:13:20.000Z',
      'OK-ACCESS-PASSPHRASE': 'test-passphrase',
    });
  });
});

describe('venue connectors', () => {
  it('queries binance bookTicker by concatenated symbol', async () => {
    const recorded: Recorded[] = [];
    const http = stubHttp((config) => ({ symbol: config.params?.symbol }), recorded);
    const connector = new BinanceConnector('binance', http, { apiKey: 'test-key', apiSecret: 'test-secret' });

    expect(await connector.fetchBookTicker(BTC_USDT)).toEqual({ symbol: 'BTCUSDT' });
    expect(recorded[0].url).toBe('/api/v3/ticker/bookTicker');
    expect(recorded[0].headers.get('X-MBX-APIKEY')).toBe('test-key');
  });

  it('sends signed kucoin headers and unwraps the envelope', async () => {
    const recorded: Recorded[] = [];
    const http = stubHttp(() => ({ code: '200000', data: null }), recorded);
    const connector = new KucoinConnector('kucoin', http, CREDENTIALS, () => 1700000000000);

    expect(await connector.fetchBookTicker(BTC_USDT)).toEqual({ code: '200000', data: null });
    expect(recorded[0].url).toBe('/api/v1/market/orderbook/level1?symbol=BTC-USDT');
    expect(recorded[0].headers.get('KC-API-SIGN')).toBe(
      hmac('1700000000000GET/api/v1/market/orderbook/level1?symbol=BTC-USDT'),
    );
  });

  it('maps kucoin throttling codes to rate limited', async () => {
    const http = stubHttp(() => ({ code: '429000', msg: 'Too many requests' }));
    const connector = new KucoinConnector('kucoin', http);

    await expect(connector.fetchMarkets()).rejects.toThrow(RateLimitedError);
    await expect(connector.fetchMarkets()).rejects.toThrow('kucoin: code 429000: Too many requests');
  });

  it('maps other okx error codes to unavailable', async () => {
    const http = stubHttp(() => ({ code: '50001', msg: 'Service temporarily unavailable' }));
    const connector = new OkxConnector('okx', http);

    await expect(connector.fetchBookTicker(BTC_USDT)).rejects.toThrow(VenueUnavailableError);
  });

  it('maps okx throttling codes to rate limited', async () => {
    const recorded: Recorded[] = [];
    const http = stubHttp(() => ({ code: '50011', msg: 'Rate limit reached' }), recorded);
    const connector = new OkxConnector('okx', http);

    await expect(connector.fetchMarkets()).rejects.toThrow(RateLimitedError);
    expect(recorded[0].url).toBe('/api/v5/public/instruments?instType=SPOT');
  });
});

describe('ccxt venues', () => {
  class FakeCcxtClient implements CcxtClient {
    orderBook: () => Promise<unknown> = async () => ({ bids: [[100, 1]], asks: [[100.5, 2]] });
    requested: Array<{ symbol: string; limit?: number }> = [];

    loadMarkets(): Promise<unknown> {
      return Promise.resolve({ 'BTC/USDT': { base: 'BTC', quote: 'USDT', active: true, spot: true } });
    }

    fetchOrderBook(symbol: string, limit?: number): Promise<unknown> {
      this.requested.push({ symbol, limit });
      return this.orderBook();
    }
  }

  const gateio: VenueSettings = {
    id: 'gateio',
    family: 'ccxt',
    credentials: null,
    takerFee: 0.002,
    makerFee: 0.002,
    requestRateCeiling: null,
    restUrl: null,
    sizeUnit: 'base',
    withdrawalFees: {},
  };

  it('takes the advertised request spacing as the rate ceiling', async () => {
    const client = new FakeCcxtClient();
    const facade = createVenueFacade(gateio, 5000, {
      ccxtClientFactory: () => ({ client, rateLimitMs: 250 }),
      clock: () => 0,
    });

    expect(facade.venueProfile()).toEqual({ venue: 'gateio', makerFee: 0.002, takerFee: 0.002, requestRateCeiling: 4 });
    const quote = await facade.fetchQuote(BTC_USDT);
    expect(client.requested).toEqual([{ symbol: 'BTC/USDT', limit: 5 }]);
    expect(quote.bid).toEqual({ price: 100, size: 1 });
  });

  it('maps ccxt throttling and network errors', async () => {
    const client = new FakeCcxtClient();
    const connector = new CcxtConnector('gateio', client);

    client.orderBook = () => Promise.reject(new RateLimitExceeded('slow down'));
    await expect(connector.fetchBookTicker(BTC_USDT)).rejects.toBeInstanceOf(RateLimitedError);
    client.orderBook = () => Promise.reject(new NetworkError('connection reset'));
    await expect(connector.fetchBookTicker(BTC_USDT)).rejects.toBeInstanceOf(VenueUnavailableError);
  });

  it('abandons a ccxt call once the signal aborts', async () => {
    const client = new FakeCcxtClient();
    client.orderBook = () => new Promise<unknown>(() => undefined);
    const connector = new CcxtConnector('gateio', client);
    const controller = new AbortController();

    const pending = connector.fetchBookTicker(BTC_USDT, { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });
});
