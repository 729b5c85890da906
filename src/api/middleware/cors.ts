/**
 * CORS Middleware Configuration
 *
 * Cross-origin access for browser clients of the tutoring API. Development
 * allows the usual local dev-server origins; production allows exactly the
 * origins listed in ALLOWED_ORIGINS.
 *
 * @example
 * ```typescript
 * app.use('*', corsMiddleware(resolveCorsConfig(config.cors.allowedOrigins, isProduction())));
 * ```
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

/**
 * Configuration options for CORS middleware
 */
export interface CorsConfig {
  /** Origins allowed to make cross-origin requests */
  allowedOrigins: string[];
  /** HTTP methods allowed for cross-origin requests */
  allowedMethods: string[];
  /** Headers allowed in cross-origin requests */
  allowedHeaders: string[];
  /** Whether credentials (cookies, authorization headers) are allowed */
  credentials: boolean;
  /** How long preflight responses can be cached (seconds) */
  maxAge: number;
}

/**
 * Development defaults.
 */
const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: [
    'http://localhost:3000',
    'http://localhost:5173',
    'http://127.0.0.1:5173',
  ],
  allowedMethods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  credentials: true,
  maxAge: 86400, // 24 hours - preflight cache duration
};

/**
 * Creates a CORS middleware handler from the defaults plus overrides.
 */
export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
  };

  return cors({
    origin: finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    credentials: finalConfig.credentials,
    maxAge: finalConfig.maxAge,
  });
}

/**
 * Picks the origin list for the environment.
 *
 * Configured origins always win. Production without configured origins
 * allows no cross-origin callers; development falls back to the defaults.
 */
export function resolveCorsConfig(
  allowedOrigins: string[],
  production: boolean
): Partial<CorsConfig> {
  if (allowedOrigins.length > 0) {
    return { allowedOrigins };
  }

  if (production) {
    console.warn('[CORS] No ALLOWED_ORIGINS set; cross-origin requests are refused');
    return { allowedOrigins: [] };
  }

  return {};
}

export { DEFAULT_CORS_CONFIG };
