export interface TokenBucketConfig {
  /** maximum tokens held, i.e. the burst size */
  capacity: number;
  refillPerSecond: number;
  initialTokens?: number;
  clock?: () => number;
}

export interface ConsumeResult {
  allowed: boolean;
  tokensRemaining: number;
  waitTimeMs?: number;
}

/** Continuous-refill token bucket. */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly clock: () => number;

  constructor(private readonly config: TokenBucketConfig) {
    if (config.capacity <= 0 || config.refillPerSecond <= 0) {
      throw new Error('token bucket capacity and refill rate must be positive');
    }
    this.clock = config.clock ?? Date.now;
    this.tokens = Math.min(config.initialTokens ?? config.capacity, config.capacity);
    this.lastRefill = this.clock();
  }

  consume(tokens = 1): ConsumeResult {
    this.refill();
    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      return { allowed: true, tokensRemaining: this.tokens };
    }
    const missing = tokens - this.tokens;
    return {
      allowed: false,
      tokensRemaining: this.tokens,
      waitTimeMs: Math.ceil((missing / this.config.refillPerSecond) * 1000),
    };
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) {
      return;
    }
    this.tokens = Math.min(this.config.capacity, this.tokens + (elapsed / 1000) * this.config.refillPerSecond);
    this.lastRefill = now;
  }
}
