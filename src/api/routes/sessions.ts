/**
 * Sessions API Routes
 *
 * HTTP surface of the session orchestrator. Every handler is a thin
 * adapter: validate the body, call the orchestrator, wrap the result.
 * Core errors propagate to the global error handler, which maps their
 * kind to a status code.
 *
 * Endpoints:
 * - POST /sessions/start         - Start (201) or resume (200) a session
 * - POST /sessions/:id/message   - Send a learner message, get the tutor reply
 * - GET  /sessions/:id           - Session, context snapshot and transcript
 * - POST /sessions/:id/abandon   - Abandon an active session (idempotent)
 * - POST /sessions/:id/notify    - Retry a failed completion notification
 *
 * The request's abort signal is passed through, so a client that hangs up
 * stops pending upstream retries and generation. Turns already written stay.
 */

import { Hono } from 'hono';
import type { SessionOrchestrator } from '@/core/session';
import { getValidatedBody, validate } from '../middleware/validate';
import { postMessageSchema, startSessionSchema } from '../types';
import { success } from '../utils/response';

/**
 * Creates the sessions router, mounted at /api/sessions.
 */
export function sessionsRoutes(orchestrator: SessionOrchestrator): Hono {
  const router = new Hono();

  /**
   * POST /start
   *
   * Body: { userId, topicId, courseId } (positive integers)
   * 201: { session, openingMessage, resumed: false }
   * 200: same shape with resumed: true when an active session already existed
   */
  router.post('/start', validate(startSessionSchema), async (c) => {
    const body = getValidatedBody(c, startSessionSchema);
    const result = await orchestrator.startSession(body, { signal: c.req.raw.signal });
    return success(c, result, result.resumed ? 200 : 201);
  });

  /**
   * POST /:id/message
   *
   * Body: { message } (1..5000 characters after trimming)
   * 200: { session, reply, completed, warning }
   *
   * `warning` is set when the session completed but the upstream could not
   * be told; the reply itself succeeded.
   */
  router.post('/:id/message', validate(postMessageSchema), async (c) => {
    const { message } = getValidatedBody(c, postMessageSchema);
    const result = await orchestrator.postMessage(c.req.param('id'), message, {
      signal: c.req.raw.signal,
    });
    return success(c, result);
  });

  /**
   * GET /:id
   *
   * 200: { session, context, turns } with the system turn omitted
   */
  router.get('/:id', async (c) => {
    const view = await orchestrator.getSession(c.req.param('id'));
    return success(c, view);
  });

  /**
   * POST /:id/abandon
   *
   * 200: { session }. Already-ended sessions are returned unchanged.
   */
  router.post('/:id/abandon', async (c) => {
    const session = await orchestrator.abandon(c.req.param('id'));
    return success(c, { session });
  });

  /**
   * POST /:id/notify
   *
   * 200: { session, delivered: true }
   * 409 when the session is not completed; 503 when the upstream is still down.
   */
  router.post('/:id/notify', async (c) => {
    const result = await orchestrator.redeliverCompletion(c.req.param('id'), {
      signal: c.req.raw.signal,
    });
    return success(c, result);
  });

  return router;
}
