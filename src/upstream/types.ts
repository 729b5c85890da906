/**
 * Upstream Transport and Wire Types
 *
 * The progress service speaks PascalCase JSON. The zod schemas below
 * validate its payloads and convert them into the camelCase domain types
 * used everywhere else.
 */

import { z } from 'zod';
import type { TopicSpec, UserContext } from '../core/models';

// ============================================================================
// Transport Contract
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

/**
 * A single request/response exchange.
 */
export interface TransportRequest {
  method: HttpMethod;
  /** Path relative to the upstream base URL, starting with '/' */
  path: string;
  /** JSON-serialisable body for POST requests */
  body?: unknown;
  signal?: AbortSignal;
}

/**
 * Classified result of one exchange.
 *
 * - success: 2xx, body parsed as JSON when present (null otherwise)
 * - retryable: network failure, timeout, 408, 429 or 5xx
 * - non_retryable: any other non-2xx status
 */
export type TransportOutcome =
  | { kind: 'success'; status: number; body: unknown }
  | { kind: 'retryable'; status: number | null; reason: string }
  | { kind: 'non_retryable'; status: number; reason: string };

export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportOutcome>;
}

/**
 * Thrown inside retried operations so the retry predicate can inspect the
 * transport's classification.
 */
export class TransportFailure extends Error {
  readonly outcome: Exclude<TransportOutcome, { kind: 'success' }>;

  constructor(outcome: Exclude<TransportOutcome, { kind: 'success' }>) {
    const status = outcome.status === null ? '' : ` (HTTP ${outcome.status})`;
    super(`${outcome.reason}${status}`);
    this.name = 'TransportFailure';
    this.outcome = outcome;
  }
}

/**
 * Thrown when a 2xx body does not match the expected schema.
 */
export class UpstreamPayloadError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(resource: string, issues: z.ZodIssue[]) {
    super(`Malformed ${resource} payload from upstream`);
    this.name = 'UpstreamPayloadError';
    this.issues = issues;
  }
}

// ============================================================================
// Wire Schemas
// ============================================================================

/**
 * GET /api/UserProgress/{userId}/context
 */
export const userContextPayloadSchema = z
  .object({
    UserId: z.number().int(),
    UserLevel: z.string().nullish(),
    CompletedTopicIds: z.array(z.number().int()).nullish(),
    StruggleTopics: z.array(z.string()).nullish(),
  })
  .transform(
    (payload): UserContext => ({
      userId: payload.UserId,
      userLevel: payload.UserLevel ?? null,
      completedTopicIds: payload.CompletedTopicIds ?? [],
      struggleTopics: payload.StruggleTopics ?? [],
    })
  );

/**
 * GET /api/TrainingTopics/{topicId}
 */
export const topicSpecPayloadSchema = z
  .object({
    Id: z.number().int(),
    Title: z.string(),
    Description: z.string(),
    PromptTemplate: z.string().nullish(),
    CourseId: z.number().int(),
    CourseTitle: z.string(),
    LearningObjectives: z.string().nullish(),
  })
  .transform(
    (payload): TopicSpec => ({
      id: payload.Id,
      title: payload.Title,
      description: payload.Description,
      promptTemplate: payload.PromptTemplate ?? null,
      courseId: payload.CourseId,
      courseTitle: payload.CourseTitle,
      learningObjectives: payload.LearningObjectives ?? null,
    })
  );

/**
 * POST /api/UserProgress/complete-topic request body.
 */
export interface CompleteTopicPayload {
  UserId: number;
  TopicId: number;
  CourseId: number;
  /** ISO 8601 */
  CompletedAt: string;
  SessionId: string;
}
