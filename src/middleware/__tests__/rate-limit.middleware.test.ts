/**
 * Rate Limit Middleware Tests
 */

import express from 'express';
import request from 'supertest';
import { SlidingWindowLimiter, rateLimitMiddleware } from '../rate-limit.middleware';

describe('SlidingWindowLimiter', () => {
  it('should allow requests up to the limit within a window', () => {
    const limiter = new SlidingWindowLimiter(1000, 2);

    expect(limiter.check('k', 0)).toEqual({
      allowed: true,
      remaining: 1,
      resetTime: 1000,
      totalRequests: 1,
    });
    expect(limiter.check('k', 100).remaining).toBe(0);
    expect(limiter.check('k', 200)).toEqual({
      allowed: false,
      remaining: 0,
      resetTime: 1000,
      totalRequests: 2,
    });
  });

  it('should free capacity as old requests leave the window', () => {
    const limiter = new SlidingWindowLimiter(1000, 2);
    limiter.check('k', 0);
    limiter.check('k', 100);

    expect(limiter.check('k', 1001)).toEqual({
      allowed: true,
      remaining: 0,
      resetTime: 1100,
      totalRequests: 2,
    });
  });

  it('should track keys independently and prune idle ones', () => {
    const limiter = new SlidingWindowLimiter(1000, 1);
    limiter.check('a', 0);

    expect(limiter.check('b', 0).allowed).toBe(true);
    expect(limiter.size).toBe(2);

    limiter.prune(5000);
    expect(limiter.size).toBe(0);
  });
});

describe('rateLimitMiddleware', () => {
  it('should answer 429 with limit headers once the limit is reached', async () => {
    const app = express();
    app.use(rateLimitMiddleware({ windowMs: 60000, maxRequests: 2 }));
    app.get('/', (req, res) => {
      res.json({ ok: true });
    });

    const first = await request(app).get('/');
    expect(first.status).toBe(200);
    expect(first.headers['ratelimit-limit']).toBe('2');
    expect(first.headers['x-ratelimit-remaining']).toBe('1');

    await request(app).get('/');
    const blocked = await request(app).get('/');

    expect(blocked.status).toBe(429);
    expect(blocked.body.success).toBe(false);
    expect(blocked.body.error).toBe('Too many requests, please try again later.');
    expect(Number(blocked.headers['retry-after'])).toBeGreaterThan(0);
  });

  it('should key requests with a custom generator', async () => {
    const app = express();
    app.use(
      rateLimitMiddleware({
        windowMs: 60000,
        maxRequests: 1,
        message: 'Slow down',
        keyGenerator: (req) => String(req.headers['x-client'] ?? 'anonymous'),
      })
    );
    app.get('/', (req, res) => {
      res.json({ ok: true });
    });

    expect((await request(app).get('/').set('x-client', 'one')).status).toBe(200);
    expect((await request(app).get('/').set('x-client', 'two')).status).toBe(200);

    const blocked = await request(app).get('/').set('x-client', 'one');
    expect(blocked.status).toBe(429);
    expect(blocked.body.error).toBe('Slow down');
  });
});
