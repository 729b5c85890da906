/**
 * Request Logger Middleware
 *
 * One console line per request. Requests that reach the text generator
 * (start and message) are tagged `gen` so their multi-second durations
 * read differently from plain reads; server errors go to stderr.
 *
 * ```
 * [API] POST /api/sessions/start 201 1.84s gen
 * [API] POST /api/sessions/sess_…/message 200 2.31s gen
 * [API] GET  /api/sessions/sess_… 404 3ms
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Requests under these path prefixes are not logged */
  skipPaths: string[];
  /** ANSI colours on the status code */
  colorize: boolean;
  enabled: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  enabled: process.env.NODE_ENV !== 'test',
};

const GENERATION_PATH = /^\/api\/sessions\/(?:start|[^/]+\/message)$/;

const RESET = '\x1b[0m';

function statusColor(status: number): string {
  if (status >= 500) return '\x1b[31m';
  if (status >= 400) return '\x1b[33m';
  return '\x1b[32m';
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Builds the log line for a finished request.
 */
export function formatRequestLine(
  config: Pick<LoggerConfig, 'prefix' | 'colorize'>,
  request: { method: string; path: string; status: number; durationMs: number }
): string {
  const status = config.colorize
    ? `${statusColor(request.status)}${request.status}${RESET}`
    : String(request.status);

  const parts = [
    config.prefix,
    request.method.padEnd(4),
    request.path,
    status,
    formatDuration(request.durationMs),
  ];
  if (request.method === 'POST' && GENERATION_PATH.test(request.path)) {
    parts.push('gen');
  }
  return parts.join(' ');
}

/**
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware());
 * app.use('*', loggerMiddleware({ enabled: false }));
 * ```
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (!finalConfig.enabled || finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startedAt = performance.now();
    await next();

    const line = formatRequestLine(finalConfig, {
      method: c.req.method,
      path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - startedAt),
    });

    if (c.res.status >= 500) {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}
