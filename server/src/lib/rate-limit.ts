import type { Context, MiddlewareHandler } from 'hono';
import { getRateLimitMaxRequests, getRateLimitWindowSeconds, isRateLimitEnabled } from './env';

export type RateLimitOptions = {
  enabled?: boolean;
  windowSeconds?: number;
  maxRequests?: number;
  /** Identifies the caller. Defaults to the first `X-Forwarded-For` hop, then `X-Real-IP`. */
  clientKey?: (c: Context) => string;
  now?: () => number;
};

function headerClientKey(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return forwardedFor || c.req.header('x-real-ip') || 'unknown';
}

/**
 * Sliding-window limit per client, held in process memory. Requests over the limit get 429 with
 * `Retry-After` set to the window length; CORS preflights are never counted.
 */
export function rateLimit(options: RateLimitOptions = {}): MiddlewareHandler {
  const enabled = options.enabled ?? isRateLimitEnabled();
  const windowSeconds = options.windowSeconds ?? getRateLimitWindowSeconds();
  const maxRequests = options.maxRequests ?? getRateLimitMaxRequests();
  const clientKey = options.clientKey ?? headerClientKey;
  const now = options.now ?? Date.now;
  const hits = new Map<string, number[]>();

  return async (c, next) => {
    if (!enabled || c.req.method === 'OPTIONS') {
      await next();
      return;
    }

    const key = clientKey(c);
    const nowMs = now();
    const windowStartMs = nowMs - windowSeconds * 1000;
    const recent = (hits.get(key) ?? []).filter((timestampMs) => timestampMs > windowStartMs);

    if (recent.length >= maxRequests) {
      hits.set(key, recent);
      console.warn(`[rate-limit] client=${key} limited requests=${recent.length} windowSeconds=${windowSeconds}`);
      return c.json({ error: 'Too many requests. Please try again later.' }, 429, {
        'Retry-After': String(windowSeconds),
      });
    }

    recent.push(nowMs);
    hits.set(key, recent);
    await next();
  };
}
