/**
 * Sessions API Tests
 *
 * Exercises /api/sessions through app.request() against the real
 * orchestrator with fake upstream and generator.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { LLMError } from '../../src/llm';
import { cleanupTestDatabase, createTestApp, createTestContext, type TestContext } from '../setup';
import {
  COMPLETE_TOPIC_PATH,
  DEFAULT_REPLY,
  TEST_COURSE_ID,
  TEST_TOPIC_ID,
  TEST_USER_ID,
  TOPIC_PATH,
  USER_CONTEXT_PATH,
  getJsonResponse,
  jsonRequest,
  ok,
  rejected,
  unavailable,
  type WireSession,
  type WireTurn,
} from '../helpers';

const START_BODY = { userId: TEST_USER_ID, topicId: TEST_TOPIC_ID, courseId: TEST_COURSE_ID };

interface StartData {
  session: WireSession;
  openingMessage: WireTurn;
  resumed: boolean;
}

interface MessageData {
  session: WireSession;
  reply: WireTurn;
  completed: boolean;
  warning: { code: string; message: string; attempts: number | null } | null;
}

interface SessionViewData {
  session: WireSession;
  context: { topicTitle: string; courseTitle: string } | null;
  turns: WireTurn[];
}

describe('Sessions API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext();
    app = createTestApp(ctx);
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  async function startSession(): Promise<string> {
    const res = await app.request('/api/sessions/start', jsonRequest(START_BODY));
    const body = await getJsonResponse<StartData>(res);
    return body.data.session.id;
  }

  async function postMessage(sessionId: string, message: unknown): Promise<Response> {
    return app.request(`/api/sessions/${sessionId}/message`, jsonRequest({ message }));
  }

  // ==========================================================================
  // POST /api/sessions/start
  // ==========================================================================

  describe('POST /api/sessions/start', () => {
    it('creates a session and returns 201', async () => {
      const res = await app.request('/api/sessions/start', jsonRequest(START_BODY));

      expect(res.status).toBe(201);
      const body = await getJsonResponse<StartData>(res);
      expect(body.success).toBe(true);
      expect(body.data.resumed).toBe(false);
      expect(body.data.session).toMatchObject({
        userId: TEST_USER_ID,
        topicId: TEST_TOPIC_ID,
        courseId: TEST_COURSE_ID,
        status: 'active',
        completedAt: null,
      });
      expect(body.data.openingMessage).toMatchObject({
        role: 'assistant',
        content: DEFAULT_REPLY,
        sequence: 2,
      });
    });

    it('returns 200 when resuming the active session', async () => {
      const sessionId = await startSession();

      const res = await app.request('/api/sessions/start', jsonRequest(START_BODY));

      expect(res.status).toBe(200);
      const body = await getJsonResponse<StartData>(res);
      expect(body.data.resumed).toBe(true);
      expect(body.data.session.id).toBe(sessionId);
    });

    it('rejects a body with invalid ids', async () => {
      const res = await app.request(
        '/api/sessions/start',
        jsonRequest({ userId: 'abc', topicId: 5, courseId: 2 })
      );

      expect(res.status).toBe(400);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects malformed JSON', async () => {
      const res = await app.request('/api/sessions/start', jsonRequest('{not json'));

      expect(res.status).toBe(400);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error).toEqual({
        code: 'INVALID_JSON',
        message: 'Request body must be valid JSON',
      });
    });

    it('returns 404 for an unknown topic', async () => {
      ctx.transport.on('GET', TOPIC_PATH, rejected(404));

      const res = await app.request('/api/sessions/start', jsonRequest(START_BODY));

      expect(res.status).toBe(404);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('NOT_FOUND');
      expect(body.error.message).toBe(`Topic with ID '${TEST_TOPIC_ID}' not found`);
    });

    it('returns 409 when the topic belongs to another course', async () => {
      const res = await app.request(
        '/api/sessions/start',
        jsonRequest({ ...START_BODY, courseId: 9 })
      );

      expect(res.status).toBe(409);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('CONFLICT');
    });

    it('returns 503 when the upstream context cannot be loaded', async () => {
      ctx.transport.on('GET', USER_CONTEXT_PATH, unavailable());

      const res = await app.request('/api/sessions/start', jsonRequest(START_BODY));

      expect(res.status).toBe(503);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('CONTEXT_UNAVAILABLE');
    });

    it('returns 502 when the opening cannot be generated', async () => {
      ctx.generator.push(new LLMError('Invalid API key', 'authentication'));

      const res = await app.request('/api/sessions/start', jsonRequest(START_BODY));

      expect(res.status).toBe(502);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('GENERATION_FAILURE');
      expect(body.error.details).toEqual({ attempts: 1 });
    });
  });

  // ==========================================================================
  // POST /api/sessions/:id/message
  // ==========================================================================

  describe('POST /api/sessions/:id/message', () => {
    it('returns the tutor reply', async () => {
      const sessionId = await startSession();
      ctx.generator.push('Uma variável guarda um valor.');

      const res = await postMessage(sessionId, '  O que é uma variável?  ');

      expect(res.status).toBe(200);
      const body = await getJsonResponse<MessageData>(res);
      expect(body.data.completed).toBe(false);
      expect(body.data.warning).toBeNull();
      expect(body.data.reply).toMatchObject({
        role: 'assistant',
        content: 'Uma variável guarda um valor.',
        sequence: 4,
      });

      // The learner's message is stored trimmed
      const turns = await ctx.store.readAll(sessionId);
      expect(turns[2].content).toBe('O que é uma variável?');
    });

    it('rejects an empty message', async () => {
      const sessionId = await startSession();

      const res = await postMessage(sessionId, '   ');

      expect(res.status).toBe(400);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: [{ path: 'message', message: 'message must not be empty' }],
      });
    });

    it('rejects a message that is too long', async () => {
      const sessionId = await startSession();

      const res = await postMessage(sessionId, 'a'.repeat(5001));

      expect(res.status).toBe(400);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.details).toEqual([
        { path: 'message', message: 'message must be at most 5000 characters' },
      ]);
    });

    it('returns 404 for an unknown session', async () => {
      const res = await postMessage('sess_missing', 'Oi');

      expect(res.status).toBe(404);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.message).toBe("Session with ID 'sess_missing' not found");
    });

    it('completes the session when the tutor emits the marker', async () => {
      const sessionId = await startSession();
      ctx.generator.push('Great job! {TOPIC_COMPLETED}');

      const res = await postMessage(sessionId, 'Uma variável guarda um valor');

      expect(res.status).toBe(200);
      const body = await getJsonResponse<MessageData>(res);
      expect(body.data.completed).toBe(true);
      expect(body.data.reply.content).toBe('Great job!');
      expect(body.data.session).toMatchObject({
        status: 'completed',
        notificationStatus: 'delivered',
        completedAt: '2026-03-01T10:00:00.000Z',
      });
      expect(ctx.transport.requestsTo('POST', COMPLETE_TOPIC_PATH)).toHaveLength(1);
    });

    it('returns 200 with a warning when the completion cannot be reported', async () => {
      ctx.transport.on('POST', COMPLETE_TOPIC_PATH, unavailable());
      const sessionId = await startSession();
      ctx.generator.push('{TOPIC_COMPLETED} Parabéns!');

      const res = await postMessage(sessionId, 'Pronto');

      expect(res.status).toBe(200);
      const body = await getJsonResponse<MessageData>(res);
      expect(body.data.completed).toBe(true);
      expect(body.data.reply.content).toBe('Parabéns!');
      expect(body.data.warning).toMatchObject({
        code: 'COMPLETION_NOTIFICATION_FAILED',
        attempts: 5,
      });
      expect(body.data.session.notificationStatus).toBe('failed');
    });

    it('returns 409 SESSION_NOT_ACTIVE after completion', async () => {
      const sessionId = await startSession();
      ctx.generator.push('{TOPIC_COMPLETED}');
      await postMessage(sessionId, 'Pronto');

      const res = await postMessage(sessionId, 'Mais uma');

      expect(res.status).toBe(409);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('SESSION_NOT_ACTIVE');
      expect(body.error.details).toEqual({ sessionId, status: 'completed' });
    });

    it('returns 502 when generation keeps failing', async () => {
      const sessionId = await startSession();
      ctx.generator.push(
        new LLMError('Overloaded', 'server_error'),
        new LLMError('Overloaded', 'server_error'),
        new LLMError('Overloaded', 'server_error')
      );

      const res = await postMessage(sessionId, 'Oi');

      expect(res.status).toBe(502);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('GENERATION_FAILURE');
      expect(body.error.details).toEqual({ attempts: 3 });
    });
  });

  // ==========================================================================
  // GET /api/sessions/:id
  // ==========================================================================

  describe('GET /api/sessions/:id', () => {
    it('returns the transcript without the system turn', async () => {
      const sessionId = await startSession();
      await postMessage(sessionId, 'Oi');

      const res = await app.request(`/api/sessions/${sessionId}`);

      expect(res.status).toBe(200);
      const body = await getJsonResponse<SessionViewData>(res);
      expect(body.data.session.id).toBe(sessionId);
      expect(body.data.context).toMatchObject({
        topicTitle: 'Variables',
        courseTitle: 'Intro to Programming',
      });
      expect(body.data.turns.map((turn) => [turn.sequence, turn.role])).toEqual([
        [2, 'assistant'],
        [3, 'user'],
        [4, 'assistant'],
      ]);
    });

    it('returns 404 for an unknown session', async () => {
      const res = await app.request('/api/sessions/sess_missing');

      expect(res.status).toBe(404);
    });
  });

  // ==========================================================================
  // POST /api/sessions/:id/abandon and /notify
  // ==========================================================================

  describe('POST /api/sessions/:id/abandon', () => {
    it('abandons the session and is idempotent', async () => {
      const sessionId = await startSession();

      const first = await app.request(`/api/sessions/${sessionId}/abandon`, { method: 'POST' });
      const second = await app.request(`/api/sessions/${sessionId}/abandon`, { method: 'POST' });

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      const firstBody = await getJsonResponse<{ session: WireSession }>(first);
      const secondBody = await getJsonResponse<{ session: WireSession }>(second);
      expect(firstBody.data.session).toMatchObject({
        status: 'abandoned',
        endedAt: '2026-03-01T10:00:00.000Z',
      });
      expect(secondBody.data.session).toEqual(firstBody.data.session);
    });
  });

  describe('POST /api/sessions/:id/notify', () => {
    it('returns 409 for a session that is not completed', async () => {
      const sessionId = await startSession();

      const res = await app.request(`/api/sessions/${sessionId}/notify`, { method: 'POST' });

      expect(res.status).toBe(409);
      const body = await getJsonResponse<unknown>(res);
      expect(body.error.code).toBe('CONFLICT');
    });

    it('redelivers a failed completion notification', async () => {
      ctx.transport.on('POST', COMPLETE_TOPIC_PATH, unavailable());
      const sessionId = await startSession();
      ctx.generator.push('{TOPIC_COMPLETED}');
      await postMessage(sessionId, 'Pronto');
      ctx.transport.on('POST', COMPLETE_TOPIC_PATH, ok(null, 204));

      const res = await app.request(`/api/sessions/${sessionId}/notify`, { method: 'POST' });

      expect(res.status).toBe(200);
      const body = await getJsonResponse<{ session: WireSession; delivered: boolean }>(res);
      expect(body.data.delivered).toBe(true);
      expect(body.data.session.notificationStatus).toBe('delivered');
    });
  });
});

describe('Sessions API rate limiting', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  it('limits generation endpoints with a shared budget', async () => {
    const app = createTestApp(ctx, { windowMs: 60000, maxRequests: 100, llmMaxRequests: 1 });

    const first = await app.request('/api/sessions/start', jsonRequest(START_BODY));
    const body = await getJsonResponse<StartData>(first);
    const limited = await app.request(
      `/api/sessions/${body.data.session.id}/message`,
      jsonRequest({ message: 'Oi' })
    );

    expect(first.status).toBe(201);
    expect(limited.status).toBe(429);
    const limitedBody = await getJsonResponse<unknown>(limited);
    expect(limitedBody.error.code).toBe('RATE_LIMITED');

    // Reads are only under the general limit
    const read = await app.request(`/api/sessions/${body.data.session.id}`);
    expect(read.status).toBe(200);
  });
});
