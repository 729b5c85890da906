/**
 * Test Setup Module
 *
 * Builds isolated test environments: an in-memory SQLite database with
 * the migrations applied, the real repositories, gateway and orchestrator,
 * and fakes for the upstream transport and the text generator.
 *
 * The retry executor gets a recording sleep, so retry schedules are
 * asserted on without any real waiting.
 */

import type { Hono } from 'hono';
import { createApp } from '../src/api/app';
import { RetryExecutor, createRetryPolicy } from '../src/core/retry';
import { ConversationStore, KeyedMutex, SessionOrchestrator } from '../src/core/session';
import { isRetryableGenerationError } from '../src/llm';
import { createDatabase, type AppDatabase } from '../src/storage/db';
import {
  SessionContextRepository,
  SessionRepository,
  SessionTurnRepository,
} from '../src/storage/repositories';
import { ExternalStateGateway } from '../src/upstream';
import {
  COMPLETION_MARKER,
  ScriptedGenerator,
  TEST_NOW,
  createDefaultTransport,
  type FakeTransport,
} from './helpers';

// ============================================================================
// Type Definitions
// ============================================================================

export interface TestContext {
  db: AppDatabase;
  sessions: SessionRepository;
  contexts: SessionContextRepository;
  turns: SessionTurnRepository;
  store: ConversationStore;
  transport: FakeTransport;
  generator: ScriptedGenerator;
  gateway: ExternalStateGateway;
  orchestrator: SessionOrchestrator;
  /** Every delay the executor waited, in order */
  delays: number[];
}

export interface TestContextOptions {
  transport?: FakeTransport;
  generator?: ScriptedGenerator;
  maxContextTurns?: number;
  /** Replaces the recording executor on the gateway */
  upstreamExecutor?: RetryExecutor;
  upstreamRetry?: { baseDelayMs: number; maxDelayMs: number };
}

// ============================================================================
// Database Setup Functions
// ============================================================================

/**
 * Creates a fresh in-memory SQLite database with all migrations applied.
 */
export function createTestDatabase(): AppDatabase {
  return createDatabase(':memory:');
}

/**
 * Closes the connection behind a test database.
 */
export function cleanupTestDatabase(ctx: { db: AppDatabase }): void {
  ctx.db.$client.close();
}

/**
 * Executor that records delays instead of waiting and stays quiet.
 */
export function createRecordingExecutor(delays: number[]): RetryExecutor {
  return new RetryExecutor({
    sleep: async (ms) => {
      delays.push(ms);
    },
    onRetry: () => {},
  });
}

// ============================================================================
// Full Context
// ============================================================================

/**
 * Wires the real orchestrator over an in-memory database.
 *
 * @example
 * ```typescript
 * const ctx = createTestContext({ generator: new ScriptedGenerator(['Olá!']) });
 * const { session } = await ctx.orchestrator.startSession(START_INPUT);
 * ```
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const db = createTestDatabase();
  const delays: number[] = [];
  const executor = createRecordingExecutor(delays);

  const sessions = new SessionRepository(db);
  const contexts = new SessionContextRepository(db);
  const turns = new SessionTurnRepository(db);
  const store = new ConversationStore(turns);

  const transport = options.transport ?? createDefaultTransport();
  const generator = options.generator ?? new ScriptedGenerator();
  const gateway = new ExternalStateGateway({
    transport,
    executor: options.upstreamExecutor ?? executor,
    retryPolicy: options.upstreamRetry,
  });

  const orchestrator = new SessionOrchestrator({
    sessions,
    contexts,
    store,
    gateway,
    generator,
    executor,
    config: {
      completionMarker: COMPLETION_MARKER,
      maxContextTurns: options.maxContextTurns ?? 50,
      generationRetry: createRetryPolicy({
        maxAttempts: 3,
        baseDelayMs: 1000,
        maxDelayMs: 8000,
        growthFactor: 2,
        isRetryable: isRetryableGenerationError,
      }),
    },
    locks: new KeyedMutex(),
    now: () => TEST_NOW,
  });

  return { db, sessions, contexts, turns, store, transport, generator, gateway, orchestrator, delays };
}

/**
 * Creates the Hono app over a test context, with logging off and limits
 * high enough not to interfere.
 */
export function createTestApp(
  ctx: TestContext,
  rateLimit: { windowMs: number; maxRequests: number; llmMaxRequests: number } = {
    windowMs: 60000,
    maxRequests: 1000,
    llmMaxRequests: 1000,
  }
): Hono {
  return createApp(
    { orchestrator: ctx.orchestrator, upstreamHealth: ctx.gateway },
    {
      environment: 'test',
      production: false,
      allowedOrigins: [],
      rateLimit,
      logRequests: false,
    }
  );
}
