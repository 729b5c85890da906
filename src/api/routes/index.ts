/**
 * API Routes Aggregator
 *
 * Combines the route modules into the router mounted at /api.
 *
 * Route Structure:
 * - /health        - Health check endpoint (mounted at root, not under /api)
 * - /api           - API root with version info
 * - /api/sessions  - Tutoring session lifecycle
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes({ probe: gateway, environment: 'development', version: API_VERSION }));
 * app.route('/api', createApiRouter({ orchestrator }));
 * ```
 */

import { Hono } from 'hono';
import type { SessionOrchestrator } from '@/core/session';
import { success } from '../utils/response';
import { sessionsRoutes } from './sessions';

export { healthRoutes, type HealthCheckData, type UpstreamHealthProbe } from './health';
export { sessionsRoutes } from './sessions';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * API information returned by the root endpoint.
 */
export interface ApiInfo {
  /** Human-readable API name */
  name: string;

  /** Current API version */
  version: string;

  /** Available top-level endpoints */
  endpoints: {
    path: string;
    description: string;
  }[];
}

export interface ApiRouterDependencies {
  orchestrator: SessionOrchestrator;
}

/**
 * API version - should match package.json version.
 */
export const API_VERSION = '0.1.0';

// ============================================================================
// API Router Factory
// ============================================================================

/**
 * Creates the main API router with all routes mounted.
 */
export function createApiRouter(deps: ApiRouterDependencies): Hono {
  const router = new Hono();

  /**
   * GET /
   *
   * Discovery endpoint for API consumers.
   */
  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Topic Tutor API',
      version: API_VERSION,
      endpoints: [
        { path: '/api/sessions/start', description: 'Start or resume a tutoring session' },
        { path: '/api/sessions/:id/message', description: 'Send a learner message' },
        { path: '/api/sessions/:id', description: 'Session details and transcript' },
        { path: '/api/sessions/:id/abandon', description: 'Abandon an active session' },
        { path: '/api/sessions/:id/notify', description: 'Retry a completion notification' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/sessions', sessionsRoutes(deps.orchestrator));

  return router;
}

export default createApiRouter;
