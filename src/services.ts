/**
 * Service Wiring
 *
 * Builds the object graph shared by the HTTP server and the CLI from a
 * validated configuration: repositories over one database connection, the
 * upstream gateway, the text generator and the session orchestrator.
 *
 * Tests pass overrides for the collaborators that would leave the process
 * (upstream transport, text generator) and for the retry executor, so no
 * real waiting happens.
 *
 * @example
 * ```typescript
 * const db = createDatabase(config.database.path);
 * const services = createServices(config, db);
 * const { session } = await services.orchestrator.startSession({ userId: 1, topicId: 5, courseId: 2 });
 * ```
 */

import type { Config } from './config';
import { ConversationStore, KeyedMutex, SessionOrchestrator } from './core/session';
import type { TurnGenerator } from './core/session';
import { RetryExecutor, createRetryPolicy } from './core/retry';
import {
  AnthropicClient,
  AnthropicTurnGenerator,
  isRetryableGenerationError,
} from './llm';
import type { AppDatabase } from './storage/db';
import {
  SessionContextRepository,
  SessionRepository,
  SessionTurnRepository,
} from './storage/repositories';
import { ExternalStateGateway, FetchHttpTransport, type HttpTransport } from './upstream';

export interface Services {
  db: AppDatabase;
  sessions: SessionRepository;
  contexts: SessionContextRepository;
  store: ConversationStore;
  gateway: ExternalStateGateway;
  orchestrator: SessionOrchestrator;
}

export interface ServiceOverrides {
  transport?: HttpTransport;
  generator?: TurnGenerator;
  executor?: RetryExecutor;
  now?: () => Date;
}

/**
 * Generator backed by the Anthropic API. The client is created on first
 * use, so commands that never generate text run without an API key.
 */
function createAnthropicGenerator(anthropic: Config['anthropic']): TurnGenerator {
  let generator: AnthropicTurnGenerator | null = null;

  return {
    generate(turns, options) {
      generator ??= new AnthropicTurnGenerator(
        new AnthropicClient({
          apiKey: anthropic.apiKey,
          model: anthropic.model,
          maxTokens: anthropic.maxTokens,
        })
      );
      return generator.generate(turns, options);
    },
  };
}

export function createServices(
  cfg: Config,
  db: AppDatabase,
  overrides: ServiceOverrides = {}
): Services {
  const executor = overrides.executor ?? new RetryExecutor();

  const sessions = new SessionRepository(db);
  const contexts = new SessionContextRepository(db);
  const store = new ConversationStore(new SessionTurnRepository(db));

  const gateway = new ExternalStateGateway({
    transport:
      overrides.transport ??
      new FetchHttpTransport({
        baseUrl: cfg.upstream.baseUrl,
        apiKey: cfg.upstream.apiKey,
        timeoutMs: cfg.upstream.timeoutMs,
      }),
    executor,
    retryPolicy: cfg.retry,
  });

  const orchestrator = new SessionOrchestrator({
    sessions,
    contexts,
    store,
    gateway,
    generator: overrides.generator ?? createAnthropicGenerator(cfg.anthropic),
    executor,
    config: {
      completionMarker: cfg.session.completionMarker,
      maxContextTurns: cfg.session.maxContextTurns,
      generationRetry: createRetryPolicy({
        maxAttempts: cfg.generation.maxAttempts,
        baseDelayMs: cfg.generation.baseDelayMs,
        maxDelayMs: cfg.generation.maxDelayMs,
        growthFactor: 2,
        isRetryable: isRetryableGenerationError,
      }),
    },
    locks: new KeyedMutex(),
    now: overrides.now,
  });

  return { db, sessions, contexts, store, gateway, orchestrator };
}
