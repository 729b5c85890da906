/**
 * Health Check Route
 *
 * Liveness endpoint for load balancers and uptime monitoring. Besides the
 * server's own status it reports whether the upstream progress service
 * answered a single probe; an unreachable upstream makes the service
 * "degraded" (sessions cannot start) but the endpoint still answers 200.
 *
 * @example
 * ```bash
 * curl http://localhost:3001/health
 *
 * # {
 * #   "success": true,
 * #   "data": {
 * #     "status": "ok",
 * #     "timestamp": "2026-01-15T10:30:00.000Z",
 * #     "environment": "development",
 * #     "version": "0.1.0",
 * #     "upstream": "reachable"
 * #   }
 * # }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

// ============================================================================
// Type Definitions
// ============================================================================

export interface HealthCheckData {
  /** 'ok' when the upstream answered, 'degraded' otherwise */
  status: 'ok' | 'degraded';

  /** ISO 8601 timestamp of when the check was performed */
  timestamp: string;

  /** Current running environment (development, production, test) */
  environment: string;

  /** Application version */
  version: string;

  upstream: 'reachable' | 'unreachable';
}

/**
 * Anything that can tell whether the upstream answers.
 * Implemented by ExternalStateGateway.
 */
export interface UpstreamHealthProbe {
  checkHealth(signal?: AbortSignal): Promise<boolean>;
}

export interface HealthRouteOptions {
  probe: UpstreamHealthProbe;
  environment: string;
  version: string;
  /** Upper bound for the upstream probe */
  probeTimeoutMs?: number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 2000;

// ============================================================================
// Route Definition
// ============================================================================

/**
 * Creates the health check router, mounted at /health.
 */
export function healthRoutes(options: HealthRouteOptions): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    let reachable: boolean;
    try {
      reachable = await options.probe.checkHealth(
        AbortSignal.timeout(options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS)
      );
    } catch (error) {
      console.warn(
        `[Health] Upstream probe failed: ${error instanceof Error ? error.message : String(error)}`
      );
      reachable = false;
    }

    const healthData: HealthCheckData = {
      status: reachable ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: options.environment,
      version: options.version,
      upstream: reachable ? 'reachable' : 'unreachable',
    };

    return success(c, healthData);
  });

  return router;
}
