/**
 * Zod Validation Middleware
 *
 * Validates the JSON request body against a zod schema before the route
 * runs. Invalid bodies throw an `AppError` that the error handler turns
 * into a 400 with field-level details; malformed JSON into a 400
 * INVALID_JSON.
 *
 * @example
 * ```typescript
 * router.post('/start', validate(startSessionSchema), async (c) => {
 *   const body = getValidatedBody(c, startSessionSchema);
 *   // body: { userId: number; topicId: number; courseId: number }
 * });
 * ```
 *
 * @example
 * ```typescript
 * // POST /api/sessions/sess_1/message with body: { "message": "" }
 * // Returns 400:
 * // {
 * //   "success": false,
 * //   "error": {
 * //     "code": "VALIDATION_ERROR",
 * //     "message": "Invalid request body",
 * //     "details": [{ "path": "message", "message": "message must not be empty" }]
 * //   }
 * // }
 * ```
 */

import type { Context, Next, MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { AppError, ErrorCodes } from './error-handler';

/**
 * Extends Hono's context variables to include validated body.
 */
declare module 'hono' {
  interface ContextVariableMap {
    /**
     * The validated request body after passing through validate middleware.
     * Read it through `getValidatedBody(c, schema)`.
     */
    validatedBody: unknown;
  }
}

/**
 * Creates a validation middleware for the given Zod schema.
 */
export function validate<T extends z.ZodTypeAny>(schema: T): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new AppError(ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400);
      }
      throw err;
    }

    const result = schema.safeParse(body);

    if (!result.success) {
      const details: ValidationErrorDetail[] = result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));

      throw new AppError(ErrorCodes.VALIDATION_ERROR, 'Invalid request body', 400, details);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

/**
 * Typed access to the body stored by `validate(schema)`.
 *
 * The stored value is parsed again with the same schema, which narrows it
 * without a cast; schemas used here must accept their own output.
 *
 * @throws ZodError if the route was not guarded by `validate(schema)`
 */
export function getValidatedBody<T extends z.ZodTypeAny>(c: Context, schema: T): z.output<T> {
  return schema.parse(c.get('validatedBody'));
}
