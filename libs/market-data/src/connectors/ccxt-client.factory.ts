import ccxt from 'ccxt';
import { ConfigurationError, VenueSettings } from '@libs/core';
import { CcxtClient } from './ccxt.connector';

type CcxtClientClass = new (config: Record<string, unknown>) => CcxtClient;

const isClientClass = (value: unknown): value is CcxtClientClass => typeof value === 'function';

export interface CcxtClientHandle {
  client: CcxtClient;
  /** minimum spacing between requests advertised by ccxt, in ms */
  rateLimitMs: number | null;
}

export const createCcxtClient = (settings: VenueSettings, timeoutMs: number): CcxtClientHandle => {
  const exchangeClass: unknown = ccxt.exchanges.includes(settings.id) ? Reflect.get(ccxt, settings.id) : undefined;
  if (!isClientClass(exchangeClass)) {
    throw new ConfigurationError(`"${settings.id}" is not a ccxt exchange id`, 'ADDITIONAL_VENUES');
  }

  const client = new exchangeClass({
    // admission is handled by the orchestrator
    enableRateLimit: false,
    timeout: timeoutMs,
    ...(settings.credentials
      ? {
          apiKey: settings.credentials.apiKey,
          secret: settings.credentials.apiSecret,
          password: settings.credentials.passphrase,
        }
      : {}),
  });
  const rateLimit: unknown = Reflect.get(client, 'rateLimit');

  return {
    client,
    rateLimitMs: typeof rateLimit === 'number' && rateLimit > 0 ? rateLimit : null,
  };
};
