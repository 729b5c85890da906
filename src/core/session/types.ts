/**
 * Session Orchestrator Types
 *
 * Collaborator interfaces the orchestrator depends on, its configuration,
 * and the shapes it returns to the API and CLI layers.
 */

import type { RetryPolicy } from '../retry';
import type { Session, SessionContext, Turn, TurnRole, TopicSpec, UserContext } from '../models';

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Produces the next assistant reply for a conversation.
 *
 * The turns always start with the system turn and are in sequence order.
 * Implementations may throw; the orchestrator decides what to retry.
 */
export interface TurnGenerator {
  generate(turns: readonly Turn[], options?: { signal?: AbortSignal }): Promise<string>;
}

/**
 * Payload of a completion notification.
 */
export interface CompletionNotice {
  userId: number;
  topicId: number;
  courseId: number;
  sessionId: string;
  completedAt: Date;
}

/**
 * The upstream operations the orchestrator needs.
 * Implemented by ExternalStateGateway; faked in tests.
 */
export interface ProgressGateway {
  fetchUserContext(userId: number, signal?: AbortSignal): Promise<UserContext>;
  fetchTopicSpec(topicId: number, signal?: AbortSignal): Promise<TopicSpec>;
  notifyCompletion(notice: CompletionNotice, signal?: AbortSignal): Promise<CompletionAck>;
}

/**
 * Acknowledgement returned by a successful notification.
 */
export interface CompletionAck {
  acknowledged: true;
  /** Attempts it took, including the successful one */
  attempts: number;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Tunables for SessionOrchestrator. Passed explicitly at construction.
 */
export interface SessionOrchestratorConfig {
  /** Token the tutor emits when the learner has mastered the topic */
  completionMarker: string;
  /** Maximum turns sent to the generator, the system turn included */
  maxContextTurns: number;
  /** Retry schedule for text generation */
  generationRetry: RetryPolicy;
}

// ============================================================================
// Inputs and Results
// ============================================================================

export interface StartSessionInput {
  userId: number;
  topicId: number;
  courseId: number;
}

export interface OperationOptions {
  /** Cancels upstream waits and generation; committed state stands */
  signal?: AbortSignal;
}

/**
 * A turn as shown outside the core: assistant content has the marker removed.
 */
export interface TurnView {
  id: string;
  role: TurnRole;
  content: string;
  sequence: number;
  createdAt: Date;
}

export interface StartSessionResult {
  session: Session;
  /** Cleaned opening message from the tutor */
  openingMessage: TurnView;
  /** True when an existing active session was returned */
  resumed: boolean;
}

/**
 * Non-fatal problem attached to an otherwise successful result.
 */
export interface CompletionWarning {
  code: 'COMPLETION_NOTIFICATION_FAILED';
  message: string;
  attempts: number | null;
}

export interface PostMessageResult {
  session: Session;
  reply: TurnView;
  completed: boolean;
  warning: CompletionWarning | null;
}

export interface SessionView {
  session: Session;
  context: SessionContext | null;
  /** Conversation without the system turn */
  turns: TurnView[];
}

export interface RedeliveryResult {
  session: Session;
  delivered: boolean;
}
