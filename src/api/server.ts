/**
 * Topic Tutor API Server
 *
 * Entry point for the HTTP server. Validates configuration, opens the
 * database, wires the services and serves the Hono app on Node.js.
 *
 * Features:
 * - Automatic port discovery (finds available port if preferred is in use)
 * - Configuration validated before anything binds
 * - Graceful shutdown on SIGINT/SIGTERM
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT - Preferred port (default: 3001)
 *   NODE_ENV - Environment mode (development/production/test)
 *   DATABASE_PATH - SQLite file (default: topic-tutor.db)
 *   ANTHROPIC_API_KEY, UPSTREAM_BASE_URL, UPSTREAM_API_KEY
 *   ALLOWED_ORIGINS - Comma-separated list of allowed CORS origins
 */

import net from 'node:net';
import { serve } from '@hono/node-server';
import { config, ConfigValidationError, isProduction, validateConfig } from '@/config';
import { createServices } from '@/services';
import { createDatabase } from '@/storage/db';
import { createApp } from './app';

/** Maximum port to try before giving up */
const MAX_PORT = 3100;

// ============================================================================
// Port Availability Check
// ============================================================================

/**
 * Finds an available port starting from the preferred port.
 *
 * Binds a temporary server to test the port, closes it, and moves on to
 * the next port on any listen error.
 *
 * @throws Error if no available port is found within the range
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = MAX_PORT
): Promise<number> {
  if (preferredPort > maxPort) {
    throw new Error(`No available port found up to ${maxPort}`);
  }

  const free = await new Promise<boolean>((resolve) => {
    const probe = net.createServer();
    probe.once('error', () => resolve(false));
    probe.listen(preferredPort, () => {
      probe.close(() => resolve(true));
    });
  });

  if (free) {
    return preferredPort;
  }

  console.log(`[Server] Port ${preferredPort} is in use, trying ${preferredPort + 1}...`);
  return findAvailablePort(preferredPort + 1, maxPort);
}

// ============================================================================
// Server Startup
// ============================================================================

async function startServer(): Promise<void> {
  try {
    validateConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(error.message);
    } else {
      console.error('[Server] Invalid configuration:', error);
    }
    process.exit(1);
  }

  const port = await findAvailablePort(config.server.port);
  const db = createDatabase(config.database.path);
  const services = createServices(config, db);

  const app = createApp(
    { orchestrator: services.orchestrator, upstreamHealth: services.gateway },
    {
      environment: config.server.nodeEnv,
      production: isProduction(),
      allowedOrigins: config.cors.allowedOrigins,
      rateLimit: config.rateLimit,
    }
  );

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host });

  console.log('');
  console.log('╔═══════════════════════════════════════════════════════════╗');
  console.log('║                 Topic Tutor API Server                    ║');
  console.log('╠═══════════════════════════════════════════════════════════╣');
  console.log(`║  Server running on http://localhost:${String(port).padEnd(22)}║`);
  console.log(`║  Environment: ${config.server.nodeEnv.padEnd(44)}║`);
  console.log(`║  Database:    ${config.database.path.padEnd(44)}║`);
  console.log(`║  Upstream:    ${config.upstream.baseUrl.padEnd(44)}║`);
  console.log('║                                                           ║');
  console.log('║  Rate Limits:                                             ║');
  console.log(`║    General:    ${`${config.rateLimit.maxRequests} requests/window`.padEnd(43)}║`);
  console.log(`║    Generation: ${`${config.rateLimit.llmMaxRequests} requests/window`.padEnd(43)}║`);
  console.log('╚═══════════════════════════════════════════════════════════╝');
  console.log('');

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => {
      db.$client.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
