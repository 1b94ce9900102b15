export * from './arbitrage/opportunity-scanner';
export * from './arbitrage/profitability';
export * from './connectors/binance.connector';
export * from './connectors/ccxt.connector';
export * from './connectors/ccxt-client.factory';
export * from './connectors/kucoin.connector';
export * from './connectors/okx.connector';
export * from './connectors/signing';
export * from './errors';
export * from './exchange.facade';
export * from './interfaces';
export * from './market-data.module';
export * from './market-snapshot';
export * from './models';
export * from './normalizers/binance.normalizer';
export * from './normalizers/ccxt.normalizer';
export * from './normalizers/common';
export * from './normalizers/kucoin.normalizer';
export * from './normalizers/okx.normalizer';
export * from './orchestrator/admission-limiter';
export * from './orchestrator/market-data-orchestrator';
export * from './orchestrator/venue-cooldown';
export * from './providers/providers.config';
export * from './symbol-universe/coinmarketcap.client';
export * from './symbol-universe/symbol-universe.service';
export * from './trading-pair';
export * from './utils/abort.util';
export * from './utils/http.util';
export * from './utils/retry.util';
export * from './utils/token-bucket';
export * from './venue-facade.factory';
export * from './venue-registry.service';
