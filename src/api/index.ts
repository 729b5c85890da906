/**
 * API Module - Barrel Export
 *
 * The HTTP surface of the tutoring service, built on Hono and served on
 * Node.js by `src/api/server.ts`.
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp(
 *   { orchestrator, upstreamHealth: gateway },
 *   { environment: 'test', production: false, allowedOrigins: [], rateLimit }
 * );
 * const res = await app.request('/api/sessions/start', { method: 'POST', body });
 * ```
 */

export { createApp, type AppDependencies, type AppOptions } from './app';

export {
  corsMiddleware,
  resolveCorsConfig,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  TUTORING_ERROR_STATUS,
  type ErrorCode,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  rateLimiter,
  type RateLimitConfig,
  validate,
  getValidatedBody,
} from './middleware';

export {
  API_VERSION,
  createApiRouter,
  healthRoutes,
  sessionsRoutes,
  type ApiInfo,
  type HealthCheckData,
  type UpstreamHealthProbe,
} from './routes';

export {
  startSessionSchema,
  postMessageSchema,
  MAX_MESSAGE_LENGTH,
  type StartSessionBody,
  type PostMessageBody,
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
} from './types';

export { success, error } from './utils/response';
