import { isAxiosError, isCancel } from 'axios';

export type VenueErrorKind = 'UNAVAILABLE' | 'RATE_LIMITED' | 'MALFORMED_RESPONSE';

/** Every failure that leaves an exchange facade is one of these. */
export abstract class VenueError extends Error {
  abstract readonly kind: VenueErrorKind;

  protected constructor(
    readonly venue: string,
    message: string,
  ) {
    super(`${venue}: ${message}`);
    this.name = new.target.name;
  }
}

export class VenueUnavailableError extends VenueError {
  readonly kind = 'UNAVAILABLE';

  constructor(venue: string, message: string) {
    super(venue, message);
  }
}

export class RateLimitedError extends VenueError {
  readonly kind = 'RATE_LIMITED';

  constructor(
    venue: string,
    message: string,
    readonly retryAfterMs: number | null = null,
  ) {
    super(venue, message);
  }
}

export class MalformedResponseError extends VenueError {
  readonly kind = 'MALFORMED_RESPONSE';

  constructor(venue: string, message: string) {
    super(venue, message);
  }
}

/** Seconds or an HTTP date, as sent in `Retry-After`. */
export const parseRetryAfter = (value: unknown, now = Date.now()): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value * 1000 : null;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? seconds * 1000 : null;
  }
  const date = Date.parse(value);
  return Number.isFinite(date) ? Math.max(0, date - now) : null;
};

/** Maps transport errors (axios, abort, anything else) onto the venue taxonomy. */
export const toVenueError = (venue: string, error: unknown): VenueError => {
  if (error instanceof VenueError) {
    return error;
  }
  if (isCancel(error)) {
    return new VenueUnavailableError(venue, 'request aborted');
  }
  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429 || status === 418) {
      const retryAfter = parseRetryAfter(error.response?.headers?.['retry-after']);
      return new RateLimitedError(venue, `HTTP ${status}`, retryAfter);
    }
    if (status !== undefined) {
      return new VenueUnavailableError(venue, `HTTP ${status}`);
    }
    return new VenueUnavailableError(venue, error.code ? `${error.code}: ${error.message}` : error.message);
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new VenueUnavailableError(venue, 'request aborted');
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new VenueUnavailableError(venue, message);
};
