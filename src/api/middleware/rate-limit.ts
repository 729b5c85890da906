/**
 * Rate Limiting Middleware
 *
 * Fixed-window request counting per client, kept in memory. Each limiter
 * owns its own counters, so the general limit and the stricter limit on
 * generation endpoints are tracked independently.
 *
 * Two tiers are configured from `config.rateLimit`:
 * 1. General API endpoints (default 100 requests per minute)
 * 2. Endpoints that call the text generator (default 20 requests per minute)
 *
 * Rate limit information is communicated via HTTP headers:
 * - X-RateLimit-Limit: Maximum requests allowed in window
 * - X-RateLimit-Remaining: Requests remaining in current window
 * - X-RateLimit-Reset: Unix timestamp when the window resets
 *
 * When rate limited, returns 429 Too Many Requests with JSON body:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "RATE_LIMITED",
 *     "message": "Too many requests. Please try again later.",
 *     "details": { "retryAfter": 45 }
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * app.use('/api/*', rateLimiter({ windowMs: 60_000, maxRequests: 100 }));
 * app.use('/api/sessions/:id/message', rateLimiter({ windowMs: 60_000, maxRequests: 20 }));
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';

/**
 * Rate limit configuration options
 */
export interface RateLimitConfig {
  /** Time window in milliseconds */
  windowMs: number;
  /** Maximum number of requests allowed in the window */
  maxRequests: number;
  /** Custom key generator function (defaults to IP-based) */
  keyGenerator?: (c: Context) => string;
  /** Message returned when rate limited */
  message?: string;
}

/**
 * Internal structure for tracking request counts per client
 */
interface RateLimitEntry {
  /** Number of requests made in current window */
  count: number;
  /** Timestamp when the current window started */
  windowStart: number;
}

/**
 * Default key generator that uses the client's IP address.
 * Falls back to a generic key if IP cannot be determined.
 */
function defaultKeyGenerator(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  if (forwardedFor) {
    // x-forwarded-for can contain multiple IPs; use the first (client IP)
    return forwardedFor.split(',')[0].trim();
  }

  const realIp = c.req.header('x-real-ip');
  if (realIp) {
    return realIp;
  }

  return 'unknown-client';
}

/**
 * Creates a rate limiting middleware with the specified configuration.
 *
 * 1. No entry for the client, or its window expired: start a new window
 * 2. Count already at maxRequests: reject with 429
 * 3. Otherwise: count the request and continue
 */
export function rateLimiter(config: RateLimitConfig): MiddlewareHandler {
  const {
    windowMs,
    maxRequests,
    keyGenerator = defaultKeyGenerator,
    message = 'Too many requests. Please try again later.',
  } = config;

  const store = new Map<string, RateLimitEntry>();

  // Drop expired windows every 5 minutes
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of Array.from(store.entries())) {
      if (now - entry.windowStart >= windowMs) {
        store.delete(key);
      }
    }
  }, 5 * 60 * 1000);

  // Prevent the cleanup interval from keeping the process alive
  cleanupInterval.unref?.();

  return async (c: Context, next) => {
    const now = Date.now();
    const clientKey = keyGenerator(c);

    let entry = store.get(clientKey);

    if (!entry || now - entry.windowStart >= windowMs) {
      entry = {
        count: 0,
        windowStart: now,
      };
      store.set(clientKey, entry);
    }

    const remaining = Math.max(0, maxRequests - entry.count - 1);
    const resetTime = Math.ceil((entry.windowStart + windowMs) / 1000);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(remaining));
    c.header('X-RateLimit-Reset', String(resetTime));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - now) / 1000);

      c.header('Retry-After', String(retryAfter));

      return c.json(
        {
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message,
            details: { retryAfter },
          },
        },
        429
      );
    }

    entry.count++;

    return next();
  };
}
