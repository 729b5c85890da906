/**
 * Test Helpers
 *
 * In-process stand-ins for everything that would leave the process
 * (the progress service transport and the text generator), upstream
 * payload builders, and small response utilities.
 */

import type { Turn, TurnRole } from '../src/core/models';
import type { TurnGenerator } from '../src/core/session';
import type { HttpTransport, TransportOutcome, TransportRequest } from '../src/upstream';

// ============================================================================
// Upstream Payloads
// ============================================================================

export const TEST_USER_ID = 1;
export const TEST_TOPIC_ID = 5;
export const TEST_COURSE_ID = 2;

/** Fixed clock for completion and abandonment timestamps */
export const TEST_NOW = new Date('2026-03-01T10:00:00.000Z');

export const COMPLETION_MARKER = '{TOPIC_COMPLETED}';

export function userPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    UserId: TEST_USER_ID,
    UserLevel: 'beginner',
    CompletedTopicIds: [3],
    StruggleTopics: [],
    ...overrides,
  };
}

export function topicPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    Id: TEST_TOPIC_ID,
    Title: 'Variables',
    Description: 'Named storage for values',
    PromptTemplate: 'Topic: {topic_title}. Level: {user_level}.',
    CourseId: TEST_COURSE_ID,
    CourseTitle: 'Intro to Programming',
    LearningObjectives: null,
    ...overrides,
  };
}

/**
 * The system prompt rendered from the default payloads.
 */
export const EXPECTED_SYSTEM_PROMPT =
  'Topic: Variables. Level: iniciante.\n\n' +
  'Quando o aluno demonstrar domínio do tópico, inclua exatamente o marcador {TOPIC_COMPLETED} na sua resposta.';

// ============================================================================
// Transport Outcomes
// ============================================================================

export function ok(body: unknown = null, status: number = 200): TransportOutcome {
  return { kind: 'success', status, body };
}

export function unavailable(status: number = 503): TransportOutcome {
  return { kind: 'retryable', status, reason: 'Service Unavailable' };
}

export function rejected(status: number): TransportOutcome {
  return { kind: 'non_retryable', status, reason: 'Rejected' };
}

export const USER_CONTEXT_PATH = `/api/UserProgress/${TEST_USER_ID}/context`;
export const TOPIC_PATH = `/api/TrainingTopics/${TEST_TOPIC_ID}`;
export const COMPLETE_TOPIC_PATH = '/api/UserProgress/complete-topic';

// ============================================================================
// Fake Transport
// ============================================================================

/**
 * Scripted HttpTransport. Each route holds a queue of outcomes; the last
 * outcome repeats once the queue is down to one. Unknown routes answer 404.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: TransportRequest[] = [];
  private readonly routes = new Map<string, TransportOutcome[]>();

  /**
   * Replaces the outcomes of a route.
   */
  on(method: 'GET' | 'POST', path: string, ...outcomes: TransportOutcome[]): this {
    this.routes.set(`${method} ${path}`, outcomes);
    return this;
  }

  async send(request: TransportRequest): Promise<TransportOutcome> {
    this.requests.push(request);

    const queue = this.routes.get(`${request.method} ${request.path}`);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];

    return next ?? rejected(404);
  }

  requestsTo(method: 'GET' | 'POST', path: string): TransportRequest[] {
    return this.requests.filter((r) => r.method === method && r.path === path);
  }
}

/**
 * Transport answering the default user, topic, completion and health routes.
 */
export function createDefaultTransport(): FakeTransport {
  return new FakeTransport()
    .on('GET', USER_CONTEXT_PATH, ok(userPayload()))
    .on('GET', TOPIC_PATH, ok(topicPayload()))
    .on('POST', COMPLETE_TOPIC_PATH, ok(null, 204))
    .on('GET', '/api/health', ok({ status: 'Healthy' }));
}

// ============================================================================
// Scripted Generator
// ============================================================================

export const DEFAULT_REPLY = 'Vamos continuar.';

/**
 * TurnGenerator returning queued replies (or throwing queued errors) and
 * recording the conversation it was given on every call.
 */
export class ScriptedGenerator implements TurnGenerator {
  readonly calls: Array<Array<{ role: TurnRole; content: string }>> = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error> = []) {
    this.replies = [...replies];
  }

  push(...replies: Array<string | Error>): this {
    this.replies.push(...replies);
    return this;
  }

  async generate(turns: readonly Turn[]): Promise<string> {
    this.calls.push(turns.map((turn) => ({ role: turn.role, content: turn.content })));

    const next = this.replies.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? DEFAULT_REPLY;
  }
}

// ============================================================================
// Response Helpers
// ============================================================================

/** Session as it appears in JSON responses */
export interface WireSession {
  id: string;
  userId: number;
  courseId: number;
  topicId: number;
  status: string;
  startedAt: string;
  completedAt: string | null;
  endedAt: string | null;
  notificationStatus: string;
}

/** Turn as it appears in JSON responses */
export interface WireTurn {
  id: string;
  role: string;
  content: string;
  sequence: number;
  createdAt: string;
}

export interface WireEnvelope<T> {
  success: boolean;
  data: T;
  error: { code: string; message: string; details?: unknown };
}

/**
 * Parses a JSON response body.
 */
export async function getJsonResponse<T>(response: Response): Promise<WireEnvelope<T>> {
  return response.json() as Promise<WireEnvelope<T>>;
}

export function jsonRequest(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}
