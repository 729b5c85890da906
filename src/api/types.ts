/**
 * API Types
 *
 * Response envelopes shared by every endpoint and the zod schemas for
 * request bodies.
 *
 * ```
 * { "success": true,  "data": { ... } }
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "...", "details": ... } }
 * ```
 */

import { z } from 'zod';

// ============================================================================
// Envelopes
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable, e.g. 'SESSION_NOT_ACTIVE' */
  code: string;
  message: string;
  /** Field errors for VALIDATION_ERROR, attempt counts for dependency failures */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * One failed field of a request body.
 */
export interface ValidationErrorDetail {
  /** Dot path of the field, e.g. 'message' */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

/**
 * Upstream identifiers are positive integers.
 */
const upstreamId = (name: string) =>
  z
    .number({ required_error: `${name} is required`, invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

/**
 * Schema for POST /api/sessions/start.
 *
 * @example
 * ```typescript
 * startSessionSchema.parse({ userId: 1, topicId: 5, courseId: 2 });
 * ```
 */
export const startSessionSchema = z.object({
  userId: upstreamId('userId'),
  topicId: upstreamId('topicId'),
  courseId: upstreamId('courseId'),
});

export type StartSessionBody = z.infer<typeof startSessionSchema>;

/**
 * Maximum length of one learner message.
 */
export const MAX_MESSAGE_LENGTH = 5000;

/**
 * Schema for POST /api/sessions/:id/message.
 * Surrounding whitespace is trimmed; a blank message is rejected.
 */
export const postMessageSchema = z.object({
  message: z
    .string({ required_error: 'message is required' })
    .trim()
    .min(1, 'message must not be empty')
    .max(MAX_MESSAGE_LENGTH, `message must be at most ${MAX_MESSAGE_LENGTH} characters`),
});

export type PostMessageBody = z.infer<typeof postMessageSchema>;
