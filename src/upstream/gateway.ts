/**
 * External State Gateway
 *
 * Typed operations against the upstream progress service, each wrapped in
 * the RetryExecutor with the same policy:
 *
 * - fetchUserContext(userId)   GET  /api/UserProgress/{userId}/context
 * - fetchTopicSpec(topicId)    GET  /api/TrainingTopics/{topicId}
 * - notifyCompletion(notice)   POST /api/UserProgress/complete-topic
 * - checkHealth()              GET  /api/health (single attempt)
 *
 * Failures are translated into the core error taxonomy:
 * - 404                         → NotFoundError, no retry
 * - other non-retryable status  → UpstreamRejectedError, no retry
 * - malformed 2xx body          → UpstreamRejectedError, no retry
 * - retries exhausted/cancelled → UpstreamUnavailableError
 *
 * Completion notifications are at-least-once: a retry after a lost response
 * may deliver the same completion twice, which the upstream tolerates.
 */

import type { z } from 'zod';
import type { TopicSpec, UserContext } from '../core/models';
import {
  NotFoundError,
  UpstreamRejectedError,
  UpstreamUnavailableError,
} from '../core/errors';
import {
  RetryAbortedError,
  RetryExecutor,
  createRetryPolicy,
  type RetryOutcome,
  type RetryPolicy,
} from '../core/retry';
import type { CompletionAck, CompletionNotice, ProgressGateway } from '../core/session/types';
import {
  TransportFailure,
  UpstreamPayloadError,
  topicSpecPayloadSchema,
  userContextPayloadSchema,
  type CompleteTopicPayload,
  type HttpTransport,
  type TransportRequest,
} from './types';

/**
 * Retry predicate for upstream calls: only transport failures the transport
 * itself classified as retryable.
 */
export function isRetryableUpstreamError(error: unknown): boolean {
  return error instanceof TransportFailure && error.outcome.kind === 'retryable';
}

export interface ExternalStateGatewayDependencies {
  transport: HttpTransport;
  executor?: RetryExecutor;
  /** Schedule overrides; the retry predicate is always the upstream one */
  retryPolicy?: Partial<Omit<RetryPolicy, 'isRetryable'>>;
}

export class ExternalStateGateway implements ProgressGateway {
  private readonly transport: HttpTransport;
  private readonly executor: RetryExecutor;
  private readonly policy: RetryPolicy;

  constructor(deps: ExternalStateGatewayDependencies) {
    this.transport = deps.transport;
    this.executor = deps.executor ?? new RetryExecutor();
    this.policy = createRetryPolicy({
      ...deps.retryPolicy,
      isRetryable: isRetryableUpstreamError,
    });
  }

  /**
   * Fetches what the upstream knows about a learner.
   *
   * @throws NotFoundError if the user does not exist upstream
   * @throws UpstreamUnavailableError after exhausting retries
   */
  async fetchUserContext(userId: number, signal?: AbortSignal): Promise<UserContext> {
    return this.request(
      { method: 'GET', path: `/api/UserProgress/${userId}/context`, signal },
      { resource: 'User', id: userId },
      userContextPayloadSchema
    );
  }

  /**
   * Fetches a topic definition.
   *
   * @throws NotFoundError if the topic does not exist upstream
   * @throws UpstreamUnavailableError after exhausting retries
   */
  async fetchTopicSpec(topicId: number, signal?: AbortSignal): Promise<TopicSpec> {
    return this.request(
      { method: 'GET', path: `/api/TrainingTopics/${topicId}`, signal },
      { resource: 'Topic', id: topicId },
      topicSpecPayloadSchema
    );
  }

  /**
   * Tells the upstream that a learner completed a topic.
   *
   * @throws UpstreamUnavailableError after exhausting retries
   */
  async notifyCompletion(notice: CompletionNotice, signal?: AbortSignal): Promise<CompletionAck> {
    const body: CompleteTopicPayload = {
      UserId: notice.userId,
      TopicId: notice.topicId,
      CourseId: notice.courseId,
      CompletedAt: notice.completedAt.toISOString(),
      SessionId: notice.sessionId,
    };

    const outcome = await this.executor.execute(
      (_attempt, attemptSignal) =>
        this.sendOnce({
          method: 'POST',
          path: '/api/UserProgress/complete-topic',
          body,
          signal: attemptSignal,
        }),
      this.policy,
      signal
    );

    if (!outcome.ok) {
      throw this.toError(outcome, { resource: 'Session', id: notice.sessionId }, 'notify completion');
    }

    console.log(
      `[Upstream] Completion of topic ${notice.topicId} by user ${notice.userId} acknowledged ` +
        `(attempts: ${outcome.attempts})`
    );
    return { acknowledged: true, attempts: outcome.attempts };
  }

  /**
   * Single-attempt reachability probe used by the health endpoint.
   */
  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      const outcome = await this.transport.send({ method: 'GET', path: '/api/health', signal });
      return outcome.kind === 'success';
    } catch (error) {
      if (error instanceof RetryAbortedError) {
        return false;
      }
      throw error;
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async request<T>(
    request: TransportRequest,
    target: { resource: string; id: string | number },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const outcome = await this.executor.execute(
      async (_attempt, attemptSignal) => {
        const body = await this.sendOnce({ ...request, signal: attemptSignal });
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
          throw new UpstreamPayloadError(target.resource, parsed.error.issues);
        }
        return parsed.data;
      },
      this.policy,
      request.signal
    );

    if (!outcome.ok) {
      throw this.toError(outcome, target, `fetch ${target.resource.toLowerCase()} ${target.id}`);
    }
    return outcome.value;
  }

  private async sendOnce(request: TransportRequest): Promise<unknown> {
    const outcome = await this.transport.send(request);
    if (outcome.kind === 'success') {
      return outcome.body;
    }
    throw new TransportFailure(outcome);
  }

  private toError(
    outcome: Extract<RetryOutcome<unknown>, { ok: false }>,
    target: { resource: string; id: string | number },
    action: string
  ): Error {
    const { error, attempts, classification } = outcome;

    if (classification === 'cancelled') {
      return new UpstreamUnavailableError(`Upstream call to ${action} was cancelled`, attempts, error);
    }

    if (error instanceof TransportFailure && error.outcome.kind === 'non_retryable') {
      if (error.outcome.status === 404) {
        return new NotFoundError(target.resource, target.id);
      }
      console.error(`[Upstream] Could not ${action}: ${error.message}`);
      return new UpstreamRejectedError(
        `Upstream rejected the request to ${action}: ${error.message}`,
        error.outcome.status,
        error
      );
    }

    if (error instanceof UpstreamPayloadError) {
      console.error(`[Upstream] Could not ${action}: ${error.message}`);
      return new UpstreamRejectedError(error.message, null, error);
    }

    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[Upstream] Could not ${action} after ${attempts} attempt(s): ${reason}`);
    return new UpstreamUnavailableError(
      `Upstream unavailable, could not ${action} after ${attempts} attempt(s)`,
      attempts,
      error
    );
  }
}
