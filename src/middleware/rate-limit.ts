/**
 * Sliding-window rate limiting per identity
 */

import type { NextFunction, Request, Response } from 'express';

export interface RateLimitDecision {
  allowed: boolean;
  /** Milliseconds until the oldest counted call leaves the window; 0 when allowed */
  retryAfterMs: number;
}

export class RateLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(
    private readonly max: number,
    private readonly windowMs: number
  ) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Rate limit max must be a positive integer, got ${max}`);
    }
  }

  /**
   * Count one call for `key` if the window has room
   */
  hit(key: string, now: number = Date.now()): RateLimitDecision {
    const windowStart = now - this.windowMs;
    const recent = (this.hits.get(key) ?? []).filter(t => t > windowStart);

    if (recent.length >= this.max) {
      this.hits.set(key, recent);
      return { allowed: false, retryAfterMs: recent[0] + this.windowMs - now };
    }

    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true, retryAfterMs: 0 };
  }

  /** Number of identities currently tracked */
  get size(): number {
    return this.hits.size;
  }

  /**
   * Forget keys with no calls inside the window
   */
  prune(now: number = Date.now()): void {
    const windowStart = now - this.windowMs;
    for (const [key, times] of this.hits) {
      if (times.every(t => t <= windowStart)) {
        this.hits.delete(key);
      }
    }
  }
}

/**
 * Must run after the auth middleware, which sets res.locals.identity
 */
export function createRateLimitMiddleware(limiter: RateLimiter) {
  return (req: Request, res: Response, next: NextFunction) => {
    const identity: unknown = res.locals.identity;
    const key = typeof identity === 'string' ? identity : (req.ip ?? 'unknown');
    const decision = limiter.hit(key);

    if (!decision.allowed) {
      const retryAfterSeconds = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
      console.warn(`Rate limit exceeded; retry in ${retryAfterSeconds}s`);
      res.setHeader('Retry-After', String(retryAfterSeconds));
      res.status(429).json({
        error: 'rate_limited',
        error_description: `Too many requests. Try again in ${retryAfterSeconds} seconds.`,
      });
      return;
    }

    next();
  };
}
