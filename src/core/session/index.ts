/**
 * Session Module - Barrel Export
 *
 * The SessionOrchestrator and its collaborators:
 *
 * - ConversationStore: append-only turn history with a bounded read window
 * - KeyedMutex: per-session serialization
 * - Collaborator interfaces (TurnGenerator, ProgressGateway) and result shapes
 *
 * @example
 * ```typescript
 * import {
 *   SessionOrchestrator,
 *   ConversationStore,
 *   type PostMessageResult,
 * } from '@/core/session';
 *
 * const orchestrator = new SessionOrchestrator({
 *   sessions: new SessionRepository(db),
 *   contexts: new SessionContextRepository(db),
 *   store: new ConversationStore(new SessionTurnRepository(db)),
 *   gateway,
 *   generator,
 *   executor: new RetryExecutor(),
 *   config,
 * });
 * ```
 */

export {
  SessionOrchestrator,
  type SessionOrchestratorDependencies,
} from './session-orchestrator';

export { ConversationStore } from './conversation-store';

export { KeyedMutex } from './keyed-mutex';

export type {
  TurnGenerator,
  ProgressGateway,
  CompletionNotice,
  CompletionAck,
  SessionOrchestratorConfig,
  StartSessionInput,
  OperationOptions,
  TurnView,
  StartSessionResult,
  CompletionWarning,
  PostMessageResult,
  SessionView,
  RedeliveryResult,
} from './types';
