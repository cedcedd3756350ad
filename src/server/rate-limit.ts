/**
 * AdFeed — Rate Limiter
 *
 * Per-client sliding-window limiter: at most N requests in any window
 * (one minute by default). Denied requests get 429 with Retry-After.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'rate-limit' });

export interface RateLimiterConfig {
  /** Requests allowed per window per client (default: 60) */
  maxRequests: number;
  /** Window length in ms (default: 60000) */
  windowMs: number;
  now: () => number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  /** Milliseconds until the oldest request leaves the window (when denied) */
  retryAfterMs?: number;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
  maxRequests: 60,
  windowMs: 60_000,
  now: () => Date.now(),
};

export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly clients = new Map<string, number[]>();

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Record a request from a client if it fits in the window.
   */
  check(clientId: string): RateLimitResult {
    const now = this.config.now();
    const windowStart = now - this.config.windowMs;
    const recent = (this.clients.get(clientId) ?? []).filter((at) => at > windowStart);

    if (recent.length >= this.config.maxRequests) {
      this.clients.set(clientId, recent);
      return {
        allowed: false,
        remaining: 0,
        retryAfterMs: Math.max(recent[0] + this.config.windowMs - now, 0),
      };
    }

    recent.push(now);
    this.clients.set(clientId, recent);
    return { allowed: true, remaining: this.config.maxRequests - recent.length };
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Drop clients with no request inside the window.
   */
  cleanup(): number {
    const windowStart = this.config.now() - this.config.windowMs;
    let removed = 0;

    for (const [clientId, times] of this.clients) {
      if (times.every((at) => at <= windowStart)) {
        this.clients.delete(clientId);
        removed++;
      }
    }

    return removed;
  }
}

/**
 * Express middleware keyed by client IP.
 */
export function rateLimit(limiter: RateLimiter): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const clientId = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const result = limiter.check(clientId);

    if (!result.allowed) {
      log.warn('Rate limit exceeded', { clientId, path: req.path });
      res.setHeader('Retry-After', Math.ceil((result.retryAfterMs ?? 0) / 1000));
      res.status(429).json({ error: 'Rate limit exceeded' });
      return;
    }

    next();
  };
}
