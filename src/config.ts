/**
 * Centralized Configuration Module
 *
 * This module provides a type-safe, validated configuration system for the
 * tutoring service. It loads configuration from environment variables and
 * validates that required values are present in production.
 *
 * Features:
 * - Type-safe configuration object with full TypeScript support
 * - Environment-aware validation (stricter in production)
 * - Clear error messages for missing required configuration
 * - Sensible defaults for optional values
 *
 * Core components never read this module; `createServices(config)` threads
 * the relevant values into their constructors.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.upstream.baseUrl);
 *
 *   // Validate configuration (throws if invalid)
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
export const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // Database configuration (SQLite file, or ':memory:')
  database: z.object({
    path: z.string().min(1).default('topic-tutor.db'),
  }),

  // Anthropic API configuration
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(1024),
  }),

  // Progress backend that owns users, topics and completion records
  upstream: z.object({
    baseUrl: z.string().url().default('http://localhost:5000'),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().positive().default(30000),
  }),

  // Retry schedule for upstream calls
  retry: z.object({
    maxAttempts: z.number().int().positive().default(5),
    baseDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().nonnegative().default(60000),
    growthFactor: z.number().min(1).default(2),
  }),

  // Retry schedule for text generation
  generation: z.object({
    maxAttempts: z.number().int().positive().default(3),
    baseDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().nonnegative().default(8000),
  }),

  // Tutoring session behaviour
  session: z.object({
    completionMarker: z.string().min(1).default('{TOPIC_COMPLETED}'),
    maxContextTurns: z.number().int().positive().default(50),
  }),

  // Rate limiting configuration
  rateLimit: z.object({
    windowMs: z.number().int().positive().default(60000),
    maxRequests: z.number().int().positive().default(100),
    llmMaxRequests: z.number().int().positive().default(20),
  }),

  // CORS configuration
  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a decimal number from an environment variable string.
 */
function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables.
 * Unset variables are left undefined so the schema defaults apply;
 * the schema rejects values of the wrong shape.
 */
export function loadFromEnvironment(env: NodeJS.ProcessEnv = process.env): unknown {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
    },
    upstream: {
      baseUrl: env.UPSTREAM_BASE_URL,
      apiKey: env.UPSTREAM_API_KEY,
      timeoutMs: parseIntOrUndefined(env.UPSTREAM_TIMEOUT_MS),
    },
    retry: {
      maxAttempts: parseIntOrUndefined(env.RETRY_MAX_ATTEMPTS),
      baseDelayMs: parseIntOrUndefined(env.RETRY_BASE_DELAY_MS),
      maxDelayMs: parseIntOrUndefined(env.RETRY_MAX_DELAY_MS),
      growthFactor: parseFloatOrUndefined(env.RETRY_GROWTH_FACTOR),
    },
    generation: {
      maxAttempts: parseIntOrUndefined(env.GENERATION_MAX_ATTEMPTS),
      baseDelayMs: parseIntOrUndefined(env.GENERATION_BASE_DELAY_MS),
      maxDelayMs: parseIntOrUndefined(env.GENERATION_MAX_DELAY_MS),
    },
    session: {
      completionMarker: env.COMPLETION_MARKER,
      maxContextTurns: parseIntOrUndefined(env.MAX_CONTEXT_TURNS),
    },
    rateLimit: {
      windowMs: parseIntOrUndefined(env.RATE_LIMIT_WINDOW_MS),
      maxRequests: parseIntOrUndefined(env.RATE_LIMIT_MAX_REQUESTS),
      llmMaxRequests: parseIntOrUndefined(env.RATE_LIMIT_LLM_MAX_REQUESTS),
    },
    cors: {
      allowedOrigins: parseCommaSeparated(env.ALLOWED_ORIGINS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Validates the configuration and throws detailed errors for production requirements.
 *
 * In production mode, the following environment variables are REQUIRED:
 * - ANTHROPIC_API_KEY: API key for Claude
 * - UPSTREAM_API_KEY: key sent to the progress backend
 * - UPSTREAM_BASE_URL: must be an http(s) URL
 *
 * In development/test mode, these are optional.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 *
 * @example
 * ```typescript
 * try {
 *   validateConfig();
 *   console.log('Configuration is valid');
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Missing vars:', error.missingVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function validateConfig(cfg: Config = config): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  // Production-only requirements
  if (cfg.server.nodeEnv === 'production') {
    if (!cfg.anthropic.apiKey) {
      missingVars.push('ANTHROPIC_API_KEY');
    }

    if (!cfg.upstream.apiKey) {
      missingVars.push('UPSTREAM_API_KEY');
    }

    if (!/^https?:\/\//.test(cfg.upstream.baseUrl)) {
      invalidVars.push({
        name: 'UPSTREAM_BASE_URL',
        reason: 'Upstream URL must start with http:// or https://',
      });
    }
  }

  if (cfg.generation.baseDelayMs > cfg.generation.maxDelayMs) {
    invalidVars.push({
      name: 'GENERATION_BASE_DELAY_MS',
      reason: 'must not exceed GENERATION_MAX_DELAY_MS',
    });
  }

  if (cfg.retry.baseDelayMs > cfg.retry.maxDelayMs) {
    invalidVars.push({
      name: 'RETRY_BASE_DELAY_MS',
      reason: 'must not exceed RETRY_MAX_DELAY_MS',
    });
  }

  // Throw if there are any validation errors
  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    const fullMessage = [
      '╔═══════════════════════════════════════════════════════════════════════╗',
      '║  CONFIGURATION ERROR                                                  ║',
      '╠═══════════════════════════════════════════════════════════════════════╣',
      `║  ${errorParts.join('\n║  ')}`,
      '║                                                                       ║',
      '║  Please check your environment variables.                             ║',
      '╚═══════════════════════════════════════════════════════════════════════╝',
    ].join('\n');

    throw new ConfigValidationError(fullMessage, missingVars, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

/**
 * Parse and validate the configuration against the schema.
 * This runs once at module load time.
 */
const parseResult = configSchema.safeParse(loadFromEnvironment());

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object.
 *
 * @example
 * ```typescript
 * import { config } from './config';
 *
 * serve({ fetch: app.fetch, port: config.server.port });
 * ```
 */
export const config: Config = parseResult.data;

/**
 * Helper function to check if we're running in production mode.
 */
export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

/**
 * Helper function to check if we're running in development mode.
 */
export function isDevelopment(): boolean {
  return config.server.nodeEnv === 'development';
}

/**
 * Helper function to check if we're running in test mode.
 */
export function isTest(): boolean {
  return config.server.nodeEnv === 'test';
}

// Export default for convenience
export default config;
