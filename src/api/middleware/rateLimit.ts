import { Request, Response, NextFunction } from 'express';

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimitOptions {
  capacity: number;
  refillPerMs: number;                 // ms needed to earn back one token
  now?: () => number;
  sweepEveryMs?: number;               // how often refilled buckets are dropped
}

// Token bucket per client IP
export function rateLimit({ capacity, refillPerMs, now = Date.now, sweepEveryMs = 60_000 }: RateLimitOptions) {
  const buckets = new Map<string, Bucket>();
  let lastSweep = now();

  // A bucket back at capacity is indistinguishable from a fresh one
  const sweep = (t: number) => {
    for (const [key, b] of buckets) {
      if (b.tokens + (t - b.lastRefill) / refillPerMs >= capacity) buckets.delete(key);
    }
    lastSweep = t;
  };

  const middleware = (req: Request, res: Response, next: NextFunction) => {
    const key = req.ip || req.headers['x-forwarded-for']?.toString() || 'unknown';
    const t = now();
    if (t - lastSweep >= sweepEveryMs) sweep(t);
    const bucket = buckets.get(key) ?? { tokens: capacity, lastRefill: t };

    bucket.tokens = Math.min(capacity, bucket.tokens + (t - bucket.lastRefill) / refillPerMs);
    bucket.lastRefill = t;
    buckets.set(key, bucket);

    if (bucket.tokens < 1) {
      const retryInMs = Math.ceil((1 - bucket.tokens) * refillPerMs);
      res.setHeader('Retry-After', String(Math.ceil(retryInMs / 1000)));
      res.status(429).json({ error: 'rate_limited', code: 'rate_limited', retryInMs });
      return;
    }

    bucket.tokens -= 1;
    next();
  };

  return Object.assign(middleware, { trackedClients: () => buckets.size });
}
