import { Logger } from '@nestjs/common';
import { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { AssetRankingSource, FetchOptions } from '../interfaces';
import { createHttpClient } from '../utils/http.util';
import { retry, RetryOptions } from '../utils/retry.util';

const listingsSchema = z.object({
  data: z.array(
    z.object({
      symbol: z.string(),
      cmc_rank: z.number().nullish(),
      tags: z.array(z.string()).nullish(),
    }),
  ),
});

export type CoinMarketCapListing = z.infer<typeof listingsSchema>['data'][number];

const STABLECOIN_TAG = 'stablecoin';

/** Symbols ranked within [startRank, endRank], stablecoins excluded, best rank first. */
export const selectRankedAssets = (
  listings: readonly CoinMarketCapListing[],
  startRank: number,
  endRank: number,
): string[] => {
  const ranked = listings
    .filter((listing): listing is CoinMarketCapListing & { cmc_rank: number } => typeof listing.cmc_rank === 'number')
    .filter((listing) => listing.cmc_rank >= startRank && listing.cmc_rank <= endRank)
    .filter((listing) => !(listing.tags ?? []).includes(STABLECOIN_TAG))
    .sort((a, b) => a.cmc_rank - b.cmc_rank)
    .map((listing) => listing.symbol.trim().toUpperCase());
  return [...new Set(ranked)];
};

export const isTransientHttpError = (error: unknown): boolean => {
  if (!isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || status === 429 || status >= 500;
};

export class CoinMarketCapClient implements AssetRankingSource {
  private readonly logger = new Logger(CoinMarketCapClient.name);

  constructor(
    private readonly http: AxiosInstance,
    private readonly retryOptions: RetryOptions = {
      attempts: 3,
      baseDelayMs: 1000,
      shouldRetry: isTransientHttpError,
    },
  ) {}

  static create(baseUrl: string, apiKey: string, timeoutMs: number): CoinMarketCapClient {
    return new CoinMarketCapClient(createHttpClient(baseUrl, timeoutMs, { 'X-CMC_PRO_API_KEY': apiKey }));
  }

  async getRankedAssets(startRank: number, endRank: number, options: FetchOptions = {}): Promise<string[]> {
    const response = await retry(
      () =>
        this.http.get<unknown>('/v1/cryptocurrency/listings/latest', {
          params: { start: startRank, limit: endRank - startRank + 1, convert: 'USD', sort: 'market_cap' },
          signal: options.signal,
        }),
      {
        ...this.retryOptions,
        signal: options.signal,
        onRetry: (error, attempt, delayMs) => {
          const message = error instanceof Error ? error.message : 'Unknown error';
          this.logger.warn(JSON.stringify({ event: 'ranking_fetch_retry', attempt, delayMs, message }));
        },
      },
    );
    const parsed = listingsSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`unexpected listings payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return selectRankedAssets(parsed.data.data, startRank, endRank);
  }
}
