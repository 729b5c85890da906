/**
 * Session Orchestrator - Lifecycle of a Tutoring Session
 *
 * The orchestrator owns every status change of a session and coordinates
 * the upstream gateway, the prompt builder, the conversation store, the
 * text generator and the completion detector:
 *
 * ```
 * startSession() -> fetch user + topic -> build prompt -> system turn -> opening
 *                                                                         |
 *                                                                         v
 * postMessage()  -> user turn -> context window -> generate -> assistant turn
 *                                                                         |
 *                                                              marker found?
 *                                                                         |
 *                                           completed -> notify upstream (warning on failure)
 * ```
 *
 * States: active -> completed | abandoned. Terminal states are final.
 *
 * Concurrency: work on one session runs under a per-session lock, so two
 * messages for the same session never interleave their appends or race on
 * the completion transition. Starts are serialized per (user, topic, course).
 * Different sessions never wait on each other.
 *
 * Cancellation: an aborted signal stops pending upstream waits and
 * generation, but turns and transitions already written stay written.
 *
 * @example
 * ```typescript
 * const orchestrator = new SessionOrchestrator({
 *   sessions, contexts, store, gateway, generator, executor,
 *   config: { completionMarker: '{TOPIC_COMPLETED}', maxContextTurns: 50, generationRetry },
 * });
 *
 * const { session, openingMessage } = await orchestrator.startSession({
 *   userId: 1, topicId: 5, courseId: 2,
 * });
 * console.log('Tutor:', openingMessage.content);
 *
 * const result = await orchestrator.postMessage(session.id, 'A variable stores a value');
 * if (result.completed) {
 *   console.log('Topic completed', result.warning ?? '');
 * }
 * ```
 */

import {
  ConflictError,
  ContextUnavailableError,
  GenerationFailureError,
  NotFoundError,
  SessionNotActiveError,
  UpstreamUnavailableError,
} from '../errors';
import type { Session, Turn } from '../models';
import { detectCompletion, stripCompletionMarker } from '../completion';
import type { RetryExecutor } from '../retry';
import { buildTutorPrompt } from '../../llm/prompts';
import type { SessionContextRepository, SessionRepository } from '../../storage/repositories';
import type { ConversationStore } from './conversation-store';
import { KeyedMutex } from './keyed-mutex';
import type {
  CompletionWarning,
  OperationOptions,
  PostMessageResult,
  ProgressGateway,
  RedeliveryResult,
  SessionOrchestratorConfig,
  SessionView,
  StartSessionInput,
  StartSessionResult,
  TurnGenerator,
  TurnView,
} from './types';

/**
 * Everything the orchestrator needs, injected at construction.
 */
export interface SessionOrchestratorDependencies {
  sessions: SessionRepository;
  contexts: SessionContextRepository;
  store: ConversationStore;
  gateway: ProgressGateway;
  generator: TurnGenerator;
  executor: RetryExecutor;
  config: SessionOrchestratorConfig;
  /** Shared lock table; a private one is created when omitted */
  locks?: KeyedMutex;
  /** Clock used for completion and abandonment timestamps */
  now?: () => Date;
}

/**
 * Generates a unique session ID like 'sess_abc123...'.
 */
function generateSessionId(): string {
  return `sess_${crypto.randomUUID()}`;
}

function sessionKey(sessionId: string): string {
  return `session:${sessionId}`;
}

function startKey(input: StartSessionInput): string {
  return `start:${input.userId}:${input.topicId}:${input.courseId}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SessionOrchestrator {
  private readonly sessions: SessionRepository;
  private readonly contexts: SessionContextRepository;
  private readonly store: ConversationStore;
  private readonly gateway: ProgressGateway;
  private readonly generator: TurnGenerator;
  private readonly executor: RetryExecutor;
  private readonly config: SessionOrchestratorConfig;
  private readonly locks: KeyedMutex;
  private readonly now: () => Date;

  constructor(deps: SessionOrchestratorDependencies) {
    this.sessions = deps.sessions;
    this.contexts = deps.contexts;
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.generator = deps.generator;
    this.executor = deps.executor;
    this.config = deps.config;
    this.locks = deps.locks ?? new KeyedMutex();
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Start
  // ==========================================================================

  /**
   * Starts a tutoring session, or resumes the active one for the same
   * (user, topic, course).
   *
   * A resumed session whose opening message never got generated gets it
   * now; otherwise the most recent tutor message is returned.
   *
   * @throws NotFoundError if the upstream does not know the user or topic
   * @throws ContextUnavailableError if the upstream data could not be fetched
   * @throws ConflictError if the topic belongs to another course
   * @throws GenerationFailureError if the opening message could not be
   *   generated; the session stays active and the next start resumes it
   */
  async startSession(
    input: StartSessionInput,
    options: OperationOptions = {}
  ): Promise<StartSessionResult> {
    return this.locks.runExclusive(startKey(input), async () => {
      const existing = await this.sessions.findActiveFor(
        input.userId,
        input.topicId,
        input.courseId
      );

      if (existing) {
        const resumed = await this.locks.runExclusive(sessionKey(existing.id), () =>
          this.resume(existing.id, options.signal)
        );
        if (resumed) {
          return resumed;
        }
      }

      return this.createSession(input, options.signal);
    });
  }

  private async createSession(
    input: StartSessionInput,
    signal?: AbortSignal
  ): Promise<StartSessionResult> {
    const { user, topic } = await this.fetchContext(input, signal);

    if (topic.courseId !== input.courseId) {
      throw new ConflictError(
        `Topic ${input.topicId} belongs to course ${topic.courseId}, not ${input.courseId}`,
        { topicId: input.topicId, courseId: input.courseId, topicCourseId: topic.courseId }
      );
    }

    const systemPrompt = buildTutorPrompt(topic, user, this.config.completionMarker);

    const { session } = this.sessions.createWithContext({
      session: {
        id: generateSessionId(),
        userId: input.userId,
        courseId: input.courseId,
        topicId: input.topicId,
        startedAt: this.now(),
      },
      context: {
        userLevel: user.userLevel,
        completedTopicIds: user.completedTopicIds,
        struggleTopics: user.struggleTopics,
        courseTitle: topic.courseTitle,
        topicTitle: topic.title,
        topicDescription: topic.description,
        learningObjectives: topic.learningObjectives,
        promptTemplate: topic.promptTemplate,
      },
      systemTurn: { id: `turn_${crypto.randomUUID()}`, content: systemPrompt },
    });

    console.log(
      `[Session] Started ${session.id} (user ${session.userId}, topic ${session.topicId}, course ${session.courseId})`
    );

    const openingMessage = await this.locks.runExclusive(sessionKey(session.id), () =>
      this.generateOpening(session.id, signal)
    );

    return { session, openingMessage, resumed: false };
  }

  /**
   * Returns the resume result, or null if the session stopped being active
   * before the lock was acquired.
   */
  private async resume(sessionId: string, signal?: AbortSignal): Promise<StartSessionResult | null> {
    const session = await this.sessions.findById(sessionId);
    if (!session || session.status !== 'active') {
      return null;
    }

    const turns = await this.store.readAll(sessionId);
    const lastAssistant = turns.filter((turn) => turn.role === 'assistant').at(-1);

    const openingMessage = lastAssistant
      ? this.toTurnView(lastAssistant)
      : await this.generateOpening(sessionId, signal);

    console.log(`[Session] Resumed ${sessionId}`);
    return { session, openingMessage, resumed: true };
  }

  /**
   * Fetches user and topic in parallel.
   * NotFoundError passes through; every other failure becomes
   * ContextUnavailableError.
   */
  private async fetchContext(input: StartSessionInput, signal?: AbortSignal) {
    // The first failure cancels the sibling fetch and its pending backoff.
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const [user, topic] = await Promise.all([
        this.gateway.fetchUserContext(input.userId, controller.signal),
        this.gateway.fetchTopicSpec(input.topicId, controller.signal),
      ]);
      return { user, topic };
    } catch (error) {
      controller.abort();
      if (error instanceof NotFoundError) {
        throw error;
      }
      throw new ContextUnavailableError(
        `Could not load context for user ${input.userId} and topic ${input.topicId}: ${describeError(error)}`,
        error
      );
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Generates the opening message from the system turn alone. A marker in
   * the opening is hidden but does not complete the session.
   */
  private async generateOpening(sessionId: string, signal?: AbortSignal): Promise<TurnView> {
    const seed = await this.store.readForContext(sessionId, 1);
    const raw = await this.generate(sessionId, seed, signal);
    const turn = await this.store.append(sessionId, 'assistant', raw);
    return this.toTurnView(turn);
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  /**
   * Processes one learner message and returns the tutor's reply.
   *
   * When the reply carries the completion marker the session is completed
   * and the upstream is notified before returning. A failed notification
   * leaves the session completed and is reported through `warning`.
   *
   * @throws NotFoundError if the session does not exist
   * @throws SessionNotActiveError if the session is completed or abandoned;
   *   nothing is appended
   * @throws GenerationFailureError if no reply could be generated; the
   *   learner's turn stays recorded and the session stays active
   */
  async postMessage(
    sessionId: string,
    text: string,
    options: OperationOptions = {}
  ): Promise<PostMessageResult> {
    return this.locks.runExclusive(sessionKey(sessionId), async () => {
      const session = await this.requireSession(sessionId);
      if (session.status !== 'active') {
        throw new SessionNotActiveError(sessionId, session.status);
      }

      await this.store.append(sessionId, 'user', text);

      const window = await this.store.readForContext(sessionId, this.config.maxContextTurns);
      const raw = await this.generate(sessionId, window, options.signal);
      const replyTurn = await this.store.append(sessionId, 'assistant', raw);

      const detection = detectCompletion(raw, this.config.completionMarker);
      const reply: TurnView = { ...this.toTurnView(replyTurn), content: detection.cleanedText };

      if (!detection.completed) {
        return { session, reply, completed: false, warning: null };
      }

      const completedAt = this.now();
      const completed = await this.sessions.transition(sessionId, 'completed', completedAt);
      if (!completed) {
        // Only reachable if something outside this process changed the row.
        const current = await this.requireSession(sessionId);
        throw new SessionNotActiveError(sessionId, current.status);
      }

      console.log(`[Session] ${sessionId} completed`);

      const delivery = await this.deliverCompletion(completed, completedAt, options.signal);
      return { session: delivery.session, reply, completed: true, warning: delivery.warning };
    });
  }

  /**
   * Runs the generator under the generation retry policy.
   */
  private async generate(
    sessionId: string,
    turns: readonly Turn[],
    signal?: AbortSignal
  ): Promise<string> {
    const outcome = await this.executor.execute(
      (_attempt, attemptSignal) => this.generator.generate(turns, { signal: attemptSignal }),
      this.config.generationRetry,
      signal
    );

    if (outcome.ok) {
      return outcome.value;
    }

    console.error(
      `[Session] Generation failed for ${sessionId} (${outcome.classification} after ${outcome.attempts} attempt(s)): ${describeError(outcome.error)}`
    );

    throw new GenerationFailureError(
      `Could not generate a tutor reply: ${describeError(outcome.error)}`,
      outcome.attempts,
      outcome.error
    );
  }

  /**
   * Notifies the upstream of a completion and records the delivery state.
   * The error is re-thrown after the session is marked 'failed'.
   */
  private async notifyUpstream(
    session: Session,
    completedAt: Date,
    signal?: AbortSignal
  ): Promise<Session> {
    try {
      await this.gateway.notifyCompletion(
        {
          userId: session.userId,
          topicId: session.topicId,
          courseId: session.courseId,
          sessionId: session.id,
          completedAt,
        },
        signal
      );
    } catch (error) {
      await this.sessions.setNotificationStatus(session.id, 'failed');
      console.warn(
        `[Session] Completion notification for ${session.id} failed: ${describeError(error)}`
      );
      throw error;
    }

    return this.sessions.setNotificationStatus(session.id, 'delivered');
  }

  /**
   * Completion delivery for postMessage: a failure becomes a warning and the
   * local completion stands.
   */
  private async deliverCompletion(
    session: Session,
    completedAt: Date,
    signal?: AbortSignal
  ): Promise<{ session: Session; warning: CompletionWarning | null }> {
    try {
      const delivered = await this.notifyUpstream(session, completedAt, signal);
      return { session: delivered, warning: null };
    } catch (error) {
      return {
        session: await this.requireSession(session.id),
        warning: {
          code: 'COMPLETION_NOTIFICATION_FAILED',
          message: `Topic completion was recorded but could not be reported upstream: ${describeError(error)}`,
          attempts: error instanceof UpstreamUnavailableError ? error.attempts : null,
        },
      };
    }
  }

  // ==========================================================================
  // Abandon / Read / Redeliver
  // ==========================================================================

  /**
   * Abandons an active session. Abandoning a session that already ended
   * returns it unchanged.
   *
   * @throws NotFoundError if the session does not exist
   */
  async abandon(sessionId: string): Promise<Session> {
    return this.locks.runExclusive(sessionKey(sessionId), async () => {
      const session = await this.requireSession(sessionId);
      if (session.status !== 'active') {
        return session;
      }

      const abandoned = await this.sessions.transition(sessionId, 'abandoned', this.now());
      if (!abandoned) {
        return this.requireSession(sessionId);
      }

      console.log(`[Session] ${sessionId} abandoned`);
      return abandoned;
    });
  }

  /**
   * Session record, context snapshot and visible transcript.
   *
   * @throws NotFoundError if the session does not exist
   */
  async getSession(sessionId: string): Promise<SessionView> {
    const session = await this.requireSession(sessionId);
    const [context, turns] = await Promise.all([
      this.contexts.findById(sessionId),
      this.store.readAll(sessionId),
    ]);

    return {
      session,
      context,
      turns: turns.filter((turn) => turn.role !== 'system').map((turn) => this.toTurnView(turn)),
    };
  }

  /**
   * Sends the completion notification again for a completed session whose
   * earlier delivery failed.
   *
   * @throws NotFoundError if the session does not exist
   * @throws ConflictError if the session is not completed
   * @throws the gateway's error if delivery fails again; the session is
   *   left with notification status 'failed'
   */
  async redeliverCompletion(
    sessionId: string,
    options: OperationOptions = {}
  ): Promise<RedeliveryResult> {
    return this.locks.runExclusive(sessionKey(sessionId), async () => {
      const session = await this.requireSession(sessionId);

      if (session.status !== 'completed' || !session.completedAt) {
        throw new ConflictError(
          `Session '${sessionId}' is ${session.status}; only completed sessions report completion`,
          { sessionId, status: session.status }
        );
      }

      if (session.notificationStatus === 'delivered') {
        return { session, delivered: true };
      }

      const updated = await this.notifyUpstream(session, session.completedAt, options.signal);
      console.log(`[Session] Completion of ${sessionId} redelivered`);
      return { session: updated, delivered: true };
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async requireSession(sessionId: string): Promise<Session> {
    const session = await this.sessions.findById(sessionId);
    if (!session) {
      throw new NotFoundError('Session', sessionId);
    }
    return session;
  }

  /**
   * Public shape of a turn; assistant text never shows the marker.
   */
  private toTurnView(turn: Turn): TurnView {
    return {
      id: turn.id,
      role: turn.role,
      content:
        turn.role === 'assistant'
          ? stripCompletionMarker(turn.content, this.config.completionMarker)
          : turn.content,
      sequence: turn.sequence,
      createdAt: turn.createdAt,
    };
  }
}
