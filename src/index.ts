/**
 * Topic Tutor - Library Entry Point
 *
 * Tutoring sessions on a single topic, kept consistent with an external
 * progress service that owns users, topics and completion records.
 *
 * The HTTP server lives in `src/api/server.ts` and the terminal client in
 * `src/cli/index.ts`; this module exposes the pieces both are built from.
 *
 * @example
 * ```typescript
 * import { config, createDatabase, createServices } from 'topic-tutor';
 *
 * const services = createServices(config, createDatabase(config.database.path));
 * const started = await services.orchestrator.startSession({ userId: 1, topicId: 5, courseId: 2 });
 * ```
 */

export * from './core/errors';
export * from './core/models';
export * from './core/retry';
export * from './core/completion';
export * from './core/session';
export * from './upstream';
export * from './llm';
export * from './storage';
export { createApp, type AppDependencies, type AppOptions } from './api';
export {
  config,
  configSchema,
  loadFromEnvironment,
  validateConfig,
  ConfigValidationError,
  type Config,
} from './config';
export { createServices, type Services, type ServiceOverrides } from './services';
