/**
 * Token bucket shared by every call to a rate-sensitive provider.
 */
export interface RateLimiterOptions {
  tokensPerInterval: number;
  interval: number; // in milliseconds
  maxTokens?: number;
  now?: () => number;
}

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly tokensPerInterval: number;
  private readonly interval: number;
  private readonly maxTokens: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    if (options.tokensPerInterval <= 0 || options.interval <= 0) {
      throw new RangeError('Rate limiter needs a positive token rate and interval');
    }

    this.tokensPerInterval = options.tokensPerInterval;
    this.interval = options.interval;
    this.maxTokens = options.maxTokens ?? options.tokensPerInterval;
    this.now = options.now ?? Date.now;
    this.tokens = this.maxTokens;
    this.lastRefill = this.now();
  }

  static perMinute(requests: number): RateLimiter {
    return new RateLimiter({ tokensPerInterval: requests, interval: 60 * 1000 });
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;

    if (elapsed < 0) {
      // Clock went backwards
      this.lastRefill = now;
      return;
    }

    const tokensToAdd = Math.floor((elapsed / this.interval) * this.tokensPerInterval);
    if (tokensToAdd > 0) {
      this.tokens = Math.min(this.tokens + tokensToAdd, this.maxTokens);
      this.lastRefill = now;
    }
  }

  public getTokensRemaining(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Milliseconds until `count` tokens are available, 0 when they already are.
   */
  public msUntilAvailable(count: number = 1): number {
    this.refill();
    if (this.tokens >= count) return 0;

    const timePerToken = this.interval / this.tokensPerInterval;
    return Math.ceil((count - this.tokens) * timePerToken);
  }

  /**
   * Take `count` tokens, waiting for the bucket to refill when it is short.
   */
  public async removeTokens(count: number = 1): Promise<void> {
    if (count > this.maxTokens) {
      throw new RangeError(`Requested tokens ${count} exceeds maximum tokens ${this.maxTokens}`);
    }

    let wait = this.msUntilAvailable(count);
    while (wait > 0) {
      await new Promise<void>(resolve => setTimeout(resolve, wait));
      wait = this.msUntilAvailable(count);
    }

    this.tokens -= count;
  }
}
