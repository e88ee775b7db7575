/**
 * Rate Limiting Middleware
 *
 * Fixed-window request limit per API key, tracked in memory. A key's own
 * `rateLimit` overrides the server default. Must run after the auth
 * middleware.
 */

import { createMiddleware } from 'hono/factory';
import { HTTPException } from 'hono/http-exception';
import type { RateLimitConfig } from '../../../../src/utils/config-schemas.js';

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Window end, epoch seconds */
  resetAt: number;
  /** Seconds until the window ends */
  retryAfter: number;
}

interface WindowEntry {
  windowStart: number;
  count: number;
}

export class FixedWindowRateLimiter {
  private windows = new Map<string, WindowEntry>();
  private windowMs: number;
  private defaultLimit: number;
  private now: () => number;

  constructor(config: RateLimitConfig, now: () => number = Date.now) {
    this.windowMs = config.windowSeconds * 1000;
    this.defaultLimit = config.maxRequests;
    this.now = now;
  }

  /**
   * Count one request for `key`; rejected requests are not counted
   */
  consume(key: string, limit: number = this.defaultLimit): RateLimitDecision {
    const now = this.now();
    const windowStart = now - (now % this.windowMs);
    const resetAt = Math.floor((windowStart + this.windowMs) / 1000);
    const retryAfter = Math.max(1, Math.ceil((windowStart + this.windowMs - now) / 1000));

    let entry = this.windows.get(key);
    if (!entry || entry.windowStart !== windowStart) {
      entry = { windowStart, count: 0 };
      this.windows.set(key, entry);
    }

    if (entry.count >= limit) {
      return { allowed: false, limit, remaining: 0, resetAt, retryAfter };
    }

    entry.count++;
    return { allowed: true, limit, remaining: limit - entry.count, resetAt, retryAfter };
  }

  /**
   * Drop entries from finished windows
   */
  prune(): number {
    const now = this.now();
    const currentWindow = now - (now % this.windowMs);
    let removed = 0;
    for (const [key, entry] of this.windows.entries()) {
      if (entry.windowStart < currentWindow) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }
}

export function createRateLimitMiddleware(limiter: FixedWindowRateLimiter) {
  return createMiddleware(async (c, next) => {
    const apiKey = c.get('apiKey');
    const decision = limiter.consume(apiKey.id, apiKey.rateLimit ?? undefined);

    c.header('X-RateLimit-Limit', decision.limit.toString());
    c.header('X-RateLimit-Remaining', decision.remaining.toString());
    c.header('X-RateLimit-Reset', decision.resetAt.toString());

    if (!decision.allowed) {
      c.header('Retry-After', decision.retryAfter.toString());
      throw new HTTPException(429, {
        message: `Rate limit exceeded. Limit: ${decision.limit} requests per window`,
      });
    }

    await next();
  });
}
