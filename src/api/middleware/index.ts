/**
 * API Middleware - Barrel Export
 *
 * Applied in this order by `createApp`:
 *
 * 1. Error Handler - `app.onError`, formats every escaped error
 * 2. Logger - Logs request information
 * 3. CORS - Handles cross-origin requests
 * 4. Rate Limiter - general limit on /api/*, stricter on generation endpoints
 *
 * @example
 * ```typescript
 * import { corsMiddleware, errorHandler, loggerMiddleware, rateLimiter } from '@/api/middleware';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.use('*', loggerMiddleware());
 * app.use('*', corsMiddleware());
 * app.use('/api/*', rateLimiter({ windowMs: 60_000, maxRequests: 100 }));
 * ```
 */

// CORS middleware for cross-origin request handling
export {
  corsMiddleware,
  resolveCorsConfig,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
} from './cors';

// Error handler for consistent error responses
export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  TUTORING_ERROR_STATUS,
  type ErrorCode,
} from './error-handler';

// Request logger for debugging and monitoring
export {
  loggerMiddleware,
  formatRequestLine,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';

// Rate limiter for API protection
export { rateLimiter, type RateLimitConfig } from './rate-limit';

// Request body validation with Zod schemas
export { validate, getValidatedBody } from './validate';
