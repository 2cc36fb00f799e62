/**
 * Rate Limit Middleware
 * In-memory sliding-window rate limiting for API routes
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  message?: string;
  keyGenerator?: (req: Request) => string;
  standardHeaders?: boolean;
  legacyHeaders?: boolean;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;
  totalRequests: number;
}

/**
 * Request timestamps per key within the current window
 */
export class SlidingWindowLimiter {
  private windows: Map<string, number[]> = new Map();

  constructor(
    private readonly windowMs: number,
    private readonly maxRequests: number
  ) {}

  check(key: string, now: number = Date.now()): RateLimitResult {
    const windowStart = now - this.windowMs;
    const timestamps = (this.windows.get(key) ?? []).filter((ts) => ts > windowStart);

    const allowed = timestamps.length < this.maxRequests;
    if (allowed) {
      timestamps.push(now);
    }

    if (timestamps.length > 0) {
      this.windows.set(key, timestamps);
    } else {
      this.windows.delete(key);
    }

    const oldest = timestamps[0] ?? now;
    return {
      allowed,
      remaining: Math.max(0, this.maxRequests - timestamps.length),
      resetTime: oldest + this.windowMs,
      totalRequests: timestamps.length,
    };
  }

  /** Drop keys whose window has fully elapsed */
  prune(now: number = Date.now()): void {
    const windowStart = now - this.windowMs;
    for (const [key, timestamps] of this.windows.entries()) {
      if (timestamps.every((ts) => ts <= windowStart)) {
        this.windows.delete(key);
      }
    }
  }

  get size(): number {
    return this.windows.size;
  }
}

/**
 * Default key generator - uses IP address
 */
function defaultKeyGenerator(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const ip = forwarded
    ? (Array.isArray(forwarded) ? forwarded[0] : forwarded.split(',')[0].trim())
    : req.socket.remoteAddress || 'unknown';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware
 */
export function rateLimitMiddleware(config: RateLimitConfig): RequestHandler {
  const limiter = new SlidingWindowLimiter(config.windowMs, config.maxRequests);
  const keyGenerator = config.keyGenerator || defaultKeyGenerator;
  const standardHeaders = config.standardHeaders !== false;
  const legacyHeaders = config.legacyHeaders !== false;
  let lastPrune = Date.now();

  return (req: Request, res: Response, next: NextFunction): void => {
    const now = Date.now();
    if (now - lastPrune > config.windowMs) {
      limiter.prune(now);
      lastPrune = now;
    }

    const result = limiter.check(keyGenerator(req), now);
    const resetTimeSeconds = Math.ceil(result.resetTime / 1000);

    if (standardHeaders) {
      res.setHeader('RateLimit-Limit', config.maxRequests.toString());
      res.setHeader('RateLimit-Remaining', result.remaining.toString());
      res.setHeader('RateLimit-Reset', resetTimeSeconds.toString());
    }

    if (legacyHeaders) {
      res.setHeader('X-RateLimit-Limit', config.maxRequests.toString());
      res.setHeader('X-RateLimit-Remaining', result.remaining.toString());
      res.setHeader('X-RateLimit-Reset', resetTimeSeconds.toString());
    }

    if (!result.allowed) {
      const retryAfter = Math.max(1, Math.ceil((result.resetTime - now) / 1000));
      res.setHeader('Retry-After', retryAfter.toString());

      res.status(429).json({
        success: false,
        error: config.message || 'Too many requests, please try again later.',
        retryAfter,
        resetTime: result.resetTime,
      });
      return;
    }

    next();
  };
}
