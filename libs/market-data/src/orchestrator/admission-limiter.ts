import { VenueProfile } from '../models';
import { AbortedError, sleep } from '../utils/abort.util';
import { TokenBucket } from '../utils/token-bucket';

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
}

/**
 * Per-venue admission: a counting semaphore bounds calls in flight and a token
 * bucket keeps starts under the venue's request-rate ceiling.
 */
export class AdmissionLimiter {
  readonly maxConcurrent: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];
  private readonly bucket: TokenBucket;

  constructor(requestRateCeiling: number, clock: () => number = Date.now) {
    this.maxConcurrent = Math.max(1, Math.ceil(requestRateCeiling));
    this.bucket = new TokenBucket({
      capacity: Math.max(1, Math.floor(requestRateCeiling)),
      refillPerSecond: requestRateCeiling,
      clock,
    });
  }

  static forProfile(profile: VenueProfile, clock?: () => number): AdmissionLimiter {
    return new AdmissionLimiter(profile.requestRateCeiling, clock);
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  /** Resolves with a release handle once a slot is free; rejects with AbortedError on abort. */
  acquireSlot(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new AbortedError());
    }
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(new AbortedError());
      };
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Waits until the rate ceiling admits one more request. */
  async waitForToken(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const result = this.bucket.consume(1);
      if (result.allowed) {
        return;
      }
      await sleep(Math.max(1, result.waitTimeMs ?? 1), signal);
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // slot passes straight to the next waiter
        next.grant(this.createRelease());
        return;
      }
      this.active -= 1;
    };
  }
}
