import type { Context, Next } from 'hono';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Create a fixed-window rate limiting middleware. Each middleware instance
 * keeps its own counters, keyed by client IP and path.
 * @param maxRequests Max requests per window
 * @param windowMs Window size in milliseconds (default 60s)
 */
export function rateLimit(maxRequests: number, windowMs: number = 60_000, now: () => number = Date.now) {
  const store = new Map<string, RateLimitEntry>();
  let lastCleanup = now();

  return async (c: Context, next: Next): Promise<Response | void> => {
    const ip = c.req.header('x-forwarded-for')?.split(',')[0]?.trim()
      || c.req.header('x-real-ip')
      || 'unknown';
    const key = `${ip}:${c.req.path}`;
    const current = now();

    // Stale entries are swept on the request path.
    if (current - lastCleanup >= CLEANUP_INTERVAL_MS) {
      for (const [k, entry] of store) {
        if (entry.resetAt <= current) store.delete(k);
      }
      lastCleanup = current;
    }

    let entry = store.get(key);
    if (!entry || entry.resetAt <= current) {
      entry = { count: 0, resetAt: current + windowMs };
      store.set(key, entry);
    }

    entry.count++;

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - current) / 1000);
      c.header('Retry-After', String(retryAfter));
      return c.json({ error: 'Too many requests', retryAfter }, 429);
    }

    await next();
  };
}
