import { Logger } from '@nestjs/common';
import { MalformedResponseError, toVenueError, VenueError } from './errors';
import { ExchangeFacade, FetchOptions, ResponseNormalizer, VenueConnector } from './interfaces';
import { Quote, VenueHealth, VenueProfile } from './models';
import { TradingPair } from './trading-pair';

/**
 * Connector + normalizer + profile behind the uniform facade. Every failure leaves
 * as a VenueError; nothing is retried here.
 */
export class VenueExchangeFacade implements ExchangeFacade {
  readonly venue: string;
  private readonly logger: Logger;
  private lastSuccessAt: number | null = null;
  private lastLatencyMs: number | null = null;
  private failures = 0;
  private lastError: string | null = null;

  constructor(
    private readonly connector: VenueConnector,
    private readonly normalizer: ResponseNormalizer,
    private readonly profile: VenueProfile,
    private readonly clock: () => number = Date.now,
  ) {
    this.venue = profile.venue;
    this.logger = new Logger(`${profile.venue}-venue`);
  }

  async fetchQuote(pair: TradingPair, options: FetchOptions = {}): Promise<Quote> {
    const startedAt = this.clock();
    try {
      const raw = await this.connector.fetchBookTicker(pair, options);
      const quote = this.normalizer.normalizeQuote(pair, raw, this.clock());
      this.recordSuccess(startedAt);
      return quote;
    } catch (error) {
      throw this.recordError(toVenueError(this.venue, error), pair);
    }
  }

  async fetchTickerUniverse(options: FetchOptions = {}): Promise<TradingPair[]> {
    const startedAt = this.clock();
    try {
      const raw = await this.connector.fetchMarkets(options);
      const pairs = this.normalizer.normalizeMarkets(raw);
      this.recordSuccess(startedAt);
      return pairs;
    } catch (error) {
      throw this.recordError(toVenueError(this.venue, error));
    }
  }

  venueProfile(): VenueProfile {
    return this.profile;
  }

  getHealth(): VenueHealth {
    return {
      venue: this.venue,
      lastSuccessAt: this.lastSuccessAt,
      lastLatencyMs: this.lastLatencyMs,
      failures: this.failures,
      lastError: this.lastError,
    };
  }

  private recordSuccess(startedAt: number): void {
    const now = this.clock();
    this.lastSuccessAt = now;
    this.lastLatencyMs = now - startedAt;
  }

  private recordError(error: VenueError, pair?: TradingPair): VenueError {
    this.failures += 1;
    this.lastError = error.message;
    if (error instanceof MalformedResponseError) {
      this.logger.warn(
        JSON.stringify({
          event: 'venue_response_malformed',
          venue: this.venue,
          pair: pair?.toString() ?? null,
          message: error.message,
        }),
      );
    }
    return error;
  }
}
