import { RateLimiter } from '../rate-limiter';

describe('RateLimiter', () => {
  it('hands out tokens until the bucket is empty', async () => {
    let now = 0;
    const limiter = new RateLimiter({ tokensPerInterval: 2, interval: 1000, now: () => now });

    await limiter.removeTokens(1);
    await limiter.removeTokens(1);

    expect(limiter.getTokensRemaining()).toBe(0);
    expect(limiter.msUntilAvailable(1)).toBe(500);

    now = 500;
    expect(limiter.getTokensRemaining()).toBe(1);
  });

  it('never refills above the maximum', () => {
    let now = 0;
    const limiter = new RateLimiter({ tokensPerInterval: 3, interval: 1000, now: () => now });

    now = 60000;
    expect(limiter.getTokensRemaining()).toBe(3);
  });

  it('rejects requests larger than the bucket', async () => {
    const limiter = RateLimiter.perMinute(5);

    await expect(limiter.removeTokens(6)).rejects.toThrow('Requested tokens 6 exceeds maximum tokens 5');
  });
});
