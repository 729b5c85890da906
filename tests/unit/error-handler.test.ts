/**
 * Error Response Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import { AppError, formatErrorResponse } from '../../src/api/middleware';
import {
  ContextUnavailableError,
  ConversationInvariantError,
  GenerationFailureError,
  NotFoundError,
  SessionNotActiveError,
  UpstreamUnavailableError,
} from '../../src/core/errors';

describe('formatErrorResponse', () => {
  it('maps core errors to their status and code', () => {
    expect(formatErrorResponse(new SessionNotActiveError('sess_1', 'completed'))).toEqual({
      statusCode: 409,
      response: {
        success: false,
        error: {
          code: 'SESSION_NOT_ACTIVE',
          message: "Session 'sess_1' is completed and no longer accepts input",
          details: { sessionId: 'sess_1', status: 'completed' },
        },
      },
    });

    expect(formatErrorResponse(new NotFoundError('Session', 'sess_x')).statusCode).toBe(404);
    expect(formatErrorResponse(new ContextUnavailableError('down')).statusCode).toBe(503);
    expect(formatErrorResponse(new GenerationFailureError('no reply', 3)).statusCode).toBe(502);
  });

  it('includes the attempt count of upstream failures', () => {
    const { response, statusCode } = formatErrorResponse(
      new UpstreamUnavailableError('Upstream unavailable', 5)
    );

    expect(statusCode).toBe(503);
    expect(response.error).toEqual({
      code: 'UPSTREAM_UNAVAILABLE',
      message: 'Upstream unavailable',
      details: { attempts: 5 },
    });
  });

  it('hides invariant violations when internals are not exposed', () => {
    const error = new ConversationInvariantError('no system turn', { sessionId: 'sess_1' });

    expect(formatErrorResponse(error, false)).toEqual({
      statusCode: 500,
      response: {
        success: false,
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred. Please try again.',
        },
      },
    });
    expect(formatErrorResponse(error, true).response.error.message).toBe('no system turn');
  });

  it('passes AppError fields through', () => {
    expect(formatErrorResponse(new AppError('RATE_LIMITED', 'Slow down', 429, { retryAfter: 3 }))).toEqual({
      statusCode: 429,
      response: {
        success: false,
        error: { code: 'RATE_LIMITED', message: 'Slow down', details: { retryAfter: 3 } },
      },
    });
  });

  it('turns unexpected errors into a generic 500 outside development', () => {
    expect(formatErrorResponse(new Error('db exploded'), false)).toEqual({
      statusCode: 500,
      response: {
        success: false,
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred. Please try again.',
        },
      },
    });
  });

  it('describes non-Error throws when internals are exposed', () => {
    expect(formatErrorResponse('oops', true).response.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      details: { rawError: 'oops' },
    });
  });
});
