/**
 * Global Error Handler
 *
 * Turns every error that escapes a route into the standard JSON envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... } // Optional additional context
 *   }
 * }
 * ```
 *
 * Core errors carry a `kind`, which decides the HTTP status, so a client
 * can tell "try again later" (503) from "this session is over" (409) from
 * "this topic does not exist" (404).
 *
 * Registered with `app.onError`; Hono routes handler errors there rather
 * than back through the middleware chain.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/api/sessions/:id', async (c) => {
 *   // NotFoundError → 404 { code: 'NOT_FOUND', ... }
 *   return success(c, await orchestrator.getSession(c.req.param('id')));
 * });
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { TutoringError, type TutoringErrorKind } from '@/core/errors';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 * These provide consistent error identification for clients.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  RATE_LIMITED: 'RATE_LIMITED',
  CONFLICT: 'CONFLICT',
  SESSION_NOT_ACTIVE: 'SESSION_NOT_ACTIVE',

  // Server and dependency errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UPSTREAM_UNAVAILABLE: 'UPSTREAM_UNAVAILABLE',
  UPSTREAM_REJECTED: 'UPSTREAM_REJECTED',
  CONTEXT_UNAVAILABLE: 'CONTEXT_UNAVAILABLE',
  GENERATION_FAILURE: 'GENERATION_FAILURE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Status and code for each core error kind.
 */
export const TUTORING_ERROR_STATUS: Record<
  TutoringErrorKind,
  { status: ContentfulStatusCode; code: ErrorCode }
> = {
  upstream_unavailable: { status: 503, code: ErrorCodes.UPSTREAM_UNAVAILABLE },
  upstream_rejected: { status: 502, code: ErrorCodes.UPSTREAM_REJECTED },
  not_found: { status: 404, code: ErrorCodes.NOT_FOUND },
  conflict: { status: 409, code: ErrorCodes.CONFLICT },
  session_not_active: { status: 409, code: ErrorCodes.SESSION_NOT_ACTIVE },
  context_unavailable: { status: 503, code: ErrorCodes.CONTEXT_UNAVAILABLE },
  generation_failure: { status: 502, code: ErrorCodes.GENERATION_FAILURE },
  conversation_invariant: { status: 500, code: ErrorCodes.INTERNAL_ERROR },
};

/**
 * Error class for controlled API-level failures that are not core errors.
 *
 * @example
 * ```typescript
 * throw new AppError('BAD_REQUEST', 'Session id must start with sess_', 400);
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode | string;
  /** HTTP status code to return */
  public readonly statusCode: ContentfulStatusCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

/**
 * Formats an error into the standard API error response structure.
 */
export function formatErrorResponse(
  error: unknown,
  exposeInternals: boolean = process.env.NODE_ENV !== 'production'
): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof TutoringError) {
    const { status, code } = TUTORING_ERROR_STATUS[error.kind];
    // Invariant violations are bugs; their wording stays internal.
    const internal = error.kind === 'conversation_invariant';

    return {
      response: {
        success: false,
        error: {
          code,
          message:
            internal && !exposeInternals ? 'An unexpected error occurred. Please try again.' : error.message,
          ...(error.details !== undefined && (!internal || exposeInternals) && { details: error.details }),
        },
      },
      statusCode: status,
    };
  }

  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  // Handle standard Error instances (unexpected errors)
  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: exposeInternals
            ? error.message
            : 'An unexpected error occurred. Please try again.',
          ...(exposeInternals && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  // Handle non-Error throws (rare but possible)
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(exposeInternals && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the handler passed to `app.onError`.
 *
 * Anything mapped to 500 is logged with its stack; expected failures
 * (4xx, dependency outages) as one warning line.
 */
export function errorHandler(): ErrorHandler {
  return (error, c) => {
    const { response, statusCode } = formatErrorResponse(error);

    if (statusCode === 500) {
      console.error('[Error Handler]', error);
    } else {
      console.warn(
        `[Error Handler] ${c.req.method} ${c.req.path} → ${statusCode} ${response.error.code}: ${response.error.message}`
      );
    }

    return c.json(response, statusCode);
  };
}
