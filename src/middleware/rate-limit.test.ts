import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate-limit.js';

describe('RateLimiter', () => {
  it('allows up to max calls per window', () => {
    const limiter = new RateLimiter(2, 1000);

    expect(limiter.hit('me', 0)).toEqual({ allowed: true, retryAfterMs: 0 });
    expect(limiter.hit('me', 100)).toEqual({ allowed: true, retryAfterMs: 0 });
    expect(limiter.hit('me', 400)).toEqual({ allowed: false, retryAfterMs: 600 });
  });

  it('slides the window instead of resetting it', () => {
    const limiter = new RateLimiter(2, 1000);
    limiter.hit('me', 0);
    limiter.hit('me', 500);

    expect(limiter.hit('me', 1000).allowed).toBe(true);
    expect(limiter.hit('me', 1200)).toEqual({ allowed: false, retryAfterMs: 300 });
  });

  it('does not count rejected calls', () => {
    const limiter = new RateLimiter(1, 1000);
    limiter.hit('me', 0);
    limiter.hit('me', 500);
    limiter.hit('me', 900);

    expect(limiter.hit('me', 1001).allowed).toBe(true);
  });

  it('counts each identity separately', () => {
    const limiter = new RateLimiter(1, 1000);

    expect(limiter.hit('me', 0).allowed).toBe(true);
    expect(limiter.hit('you', 0).allowed).toBe(true);
    expect(limiter.hit('me', 10).allowed).toBe(false);
  });

  it('forgets identities whose calls left the window', () => {
    const limiter = new RateLimiter(5, 1000);
    limiter.hit('old', 0);
    limiter.hit('recent', 800);

    limiter.prune(1500);

    expect(limiter.size).toBe(1);
  });

  it('needs a positive limit', () => {
    expect(() => new RateLimiter(0, 1000)).toThrow(RangeError);
  });
});
