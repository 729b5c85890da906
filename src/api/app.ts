/**
 * Hono Application Factory
 *
 * Assembles middleware and routes into an application. Kept apart from the
 * server startup so tests can drive the app in-process through
 * `app.request()` without binding a port.
 *
 * Middleware is applied in this order:
 * 1. Error Handler - `app.onError`, formats every escaped error
 * 2. Logger - Logs all requests with timing
 * 3. CORS - Handles cross-origin requests
 * 4. Rate Limiters - general limit on /api/*, stricter on generation endpoints
 */

import { Hono } from 'hono';
import type { SessionOrchestrator } from '@/core/session';
import {
  corsMiddleware,
  errorHandler,
  loggerMiddleware,
  rateLimiter,
  resolveCorsConfig,
} from './middleware';
import { API_VERSION, createApiRouter, healthRoutes, type UpstreamHealthProbe } from './routes';

export interface AppDependencies {
  orchestrator: SessionOrchestrator;
  upstreamHealth: UpstreamHealthProbe;
}

export interface AppOptions {
  environment: string;
  production: boolean;
  allowedOrigins: string[];
  rateLimit: {
    windowMs: number;
    maxRequests: number;
    llmMaxRequests: number;
  };
  /** Defaults to on outside tests */
  logRequests?: boolean;
}

/**
 * Creates and configures the Hono application.
 *
 * @example
 * ```typescript
 * const app = createApp(
 *   { orchestrator: services.orchestrator, upstreamHealth: services.gateway },
 *   {
 *     environment: config.server.nodeEnv,
 *     production: isProduction(),
 *     allowedOrigins: config.cors.allowedOrigins,
 *     rateLimit: config.rateLimit,
 *   }
 * );
 * const res = await app.request('/health');
 * ```
 */
export function createApp(deps: AppDependencies, options: AppOptions): Hono {
  const app = new Hono();

  // ---------------------------------------------------------------------------
  // Global Middleware
  // ---------------------------------------------------------------------------

  app.onError(errorHandler());

  app.use('*', loggerMiddleware(
    options.logRequests === undefined ? {} : { enabled: options.logRequests }
  ));

  app.use('*', corsMiddleware(resolveCorsConfig(options.allowedOrigins, options.production)));

  // ---------------------------------------------------------------------------
  // Health Check Route (mounted at root, not under /api)
  // ---------------------------------------------------------------------------

  app.route(
    '/health',
    healthRoutes({
      probe: deps.upstreamHealth,
      environment: options.environment,
      version: API_VERSION,
    })
  );

  // ---------------------------------------------------------------------------
  // API Routes with Rate Limiting
  // ---------------------------------------------------------------------------

  app.use(
    '/api/*',
    rateLimiter({
      windowMs: options.rateLimit.windowMs,
      maxRequests: options.rateLimit.maxRequests,
    })
  );

  // Both endpoints call the text generator; they share one budget
  const generationLimiter = rateLimiter({
    windowMs: options.rateLimit.windowMs,
    maxRequests: options.rateLimit.llmMaxRequests,
  });
  app.use('/api/sessions/start', generationLimiter);
  app.use('/api/sessions/:id/message', generationLimiter);

  app.route('/api', createApiRouter({ orchestrator: deps.orchestrator }));

  // ---------------------------------------------------------------------------
  // 404 Handler for unmatched routes
  // ---------------------------------------------------------------------------

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: `Route ${c.req.method} ${c.req.path} not found`,
        },
      },
      404
    );
  });

  return app;
}
