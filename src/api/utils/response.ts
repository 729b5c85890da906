/**
 * API Response Utilities
 *
 * Helpers that wrap route results in the standard envelopes defined in
 * types.ts, so every endpoint answers with either
 * `{ success: true, data }` or `{ success: false, error: { code, message } }`.
 *
 * @example
 * ```typescript
 * import { success } from '@/api/utils/response';
 *
 * router.get('/:id', async (c) => {
 *   const view = await orchestrator.getSession(c.req.param('id'));
 *   return success(c, view);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

// ============================================================================
// Success Response Helper
// ============================================================================

/**
 * Creates a standardized success response.
 *
 * @param statusCode - HTTP status code (default: 200)
 *
 * @example
 * ```typescript
 * // 201 for a newly created session, 200 when an active one was resumed
 * return success(c, result, result.resumed ? 200 : 201);
 * ```
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Error Response Helper
// ============================================================================

/**
 * Creates a standardized error response.
 *
 * @param code - Machine-readable error code (e.g., 'NOT_FOUND', 'VALIDATION_ERROR')
 * @param message - Human-readable error message
 * @param statusCode - HTTP status code (default: 400)
 * @param details - Optional additional error context
 *
 * @example
 * ```typescript
 * return error(c, 'RATE_LIMITED', 'Too many requests', 429, { retryAfter: 30 });
 * ```
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}
