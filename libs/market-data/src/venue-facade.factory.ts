import { AppSettings, VenueSettings } from '@libs/core';
import { BinanceConnector } from './connectors/binance.connector';
import { CcxtConnector } from './connectors/ccxt.connector';
import { CcxtClientHandle, createCcxtClient } from './connectors/ccxt-client.factory';
import { KucoinConnector } from './connectors/kucoin.connector';
import { OkxConnector } from './connectors/okx.connector';
import { VenueExchangeFacade } from './exchange.facade';
import { ExchangeFacade } from './interfaces';
import { BinanceNormalizer } from './normalizers/binance.normalizer';
import { CcxtNormalizer } from './normalizers/ccxt.normalizer';
import { KucoinNormalizer } from './normalizers/kucoin.normalizer';
import { OkxNormalizer } from './normalizers/okx.normalizer';
import { buildVenueProfile, getVenueEndpoint } from './providers/providers.config';
import { createHttpClient } from './utils/http.util';

export interface VenueFacadeDependencies {
  ccxtClientFactory: (settings: VenueSettings, timeoutMs: number) => CcxtClientHandle;
  clock: () => number;
}

const defaultDependencies: VenueFacadeDependencies = {
  ccxtClientFactory: createCcxtClient,
  clock: Date.now,
};

export const createVenueFacade = (
  venue: VenueSettings,
  timeoutMs: number,
  deps: VenueFacadeDependencies = defaultDependencies,
): ExchangeFacade => {
  const options = { sizeUnit: venue.sizeUnit };

  switch (venue.family) {
    case 'binance': {
      const http = createHttpClient(getVenueEndpoint(venue), timeoutMs);
      return new VenueExchangeFacade(
        new BinanceConnector(venue.id, http, venue.credentials),
        new BinanceNormalizer(venue.id, options),
        buildVenueProfile(venue),
        deps.clock,
      );
    }
    case 'kucoin': {
      const http = createHttpClient(getVenueEndpoint(venue), timeoutMs);
      return new VenueExchangeFacade(
        new KucoinConnector(venue.id, http, venue.credentials, deps.clock),
        new KucoinNormalizer(venue.id, options),
        buildVenueProfile(venue),
        deps.clock,
      );
    }
    case 'okx': {
      const http = createHttpClient(getVenueEndpoint(venue), timeoutMs);
      return new VenueExchangeFacade(
        new OkxConnector(venue.id, http, venue.credentials, deps.clock),
        new OkxNormalizer(venue.id, options),
        buildVenueProfile(venue),
        deps.clock,
      );
    }
    case 'ccxt': {
      const handle = deps.ccxtClientFactory(venue, timeoutMs);
      const advertised = handle.rateLimitMs ? 1000 / handle.rateLimitMs : null;
      return new VenueExchangeFacade(
        new CcxtConnector(venue.id, handle.client),
        new CcxtNormalizer(venue.id, options),
        buildVenueProfile(venue, advertised),
        deps.clock,
      );
    }
  }
};

export const createExchangeFacades = (
  settings: AppSettings,
  deps: VenueFacadeDependencies = defaultDependencies,
): ExchangeFacade[] => settings.venues.map((venue) => createVenueFacade(venue, settings.cycle.requestTimeoutMs, deps));
