import { NativeVenue, VenueSettings } from '@libs/core';
import { VenueProfile } from '../models';

export interface VenueDefaults {
  rest: string;
  /** requests per second */
  requestRateCeiling: number;
}

export const VENUE_DEFAULTS: Record<NativeVenue, VenueDefaults> = {
  binance: { rest: 'https://data-api.binance.vision', requestRateCeiling: 10 },
  kucoin: { rest: 'https://api.kucoin.com', requestRateCeiling: 10 },
  okx: { rest: 'https://www.okx.com', requestRateCeiling: 10 },
};

export const CCXT_DEFAULT_RATE_CEILING = 5;

export const getVenueEndpoint = (settings: VenueSettings): string => {
  if (settings.restUrl) {
    return settings.restUrl;
  }
  return settings.family === 'ccxt' ? '' : VENUE_DEFAULTS[settings.family].rest;
};

/**
 * Explicit `<VENUE>_RATE_LIMIT_RPS` wins, then what the client library advertises,
 * then the family default.
 */
export const buildVenueProfile = (settings: VenueSettings, advertisedRateCeiling: number | null = null): VenueProfile => {
  const familyDefault =
    settings.family === 'ccxt' ? CCXT_DEFAULT_RATE_CEILING : VENUE_DEFAULTS[settings.family].requestRateCeiling;
  const profile: VenueProfile = {
    venue: settings.id,
    makerFee: settings.makerFee,
    takerFee: settings.takerFee,
    requestRateCeiling: settings.requestRateCeiling ?? advertisedRateCeiling ?? familyDefault,
    ...(Object.keys(settings.withdrawalFees).length > 0
      ? { withdrawalFees: Object.freeze({ ...settings.withdrawalFees }) }
      : {}),
  };
  return Object.freeze(profile);
};
