/**
 * Tutoring Error Taxonomy
 *
 * Every failure the core surfaces to its callers is one of these classes.
 * The `kind` field lets the API layer map errors to status codes without
 * instanceof chains, and lets callers tell "try again later" apart from
 * "this session is over" and "this topic does not exist".
 *
 * @example
 * ```typescript
 * try {
 *   await orchestrator.postMessage(sessionId, text);
 * } catch (error) {
 *   if (error instanceof TutoringError && error.kind === 'session_not_active') {
 *     console.log('Session already finished');
 *   }
 * }
 * ```
 */

export type TutoringErrorKind =
  | 'upstream_unavailable'   // upstream unreachable after retries
  | 'upstream_rejected'      // upstream refused the request or sent a malformed body
  | 'not_found'              // user, topic or session does not exist
  | 'conflict'               // request conflicts with current state
  | 'session_not_active'     // input on a completed or abandoned session
  | 'context_unavailable'    // session start could not fetch its context
  | 'generation_failure'     // the text generator failed after retries
  | 'conversation_invariant'; // an append would break turn ordering rules

/**
 * Base class for all classified core failures.
 */
export class TutoringError extends Error {
  readonly kind: TutoringErrorKind;
  /** Additional machine-readable context, surfaced as API error details */
  readonly details?: Record<string, unknown>;

  constructor(
    kind: TutoringErrorKind,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'TutoringError';
    this.kind = kind;
    this.details = options.details;
  }
}

export class UpstreamUnavailableError extends TutoringError {
  /** How many attempts were made before giving up */
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super('upstream_unavailable', message, { cause, details: { attempts } });
    this.name = 'UpstreamUnavailableError';
    this.attempts = attempts;
  }
}

export class UpstreamRejectedError extends TutoringError {
  readonly status: number | null;

  constructor(message: string, status: number | null, cause?: unknown) {
    super('upstream_rejected', message, { cause, details: { status } });
    this.name = 'UpstreamRejectedError';
    this.status = status;
  }
}

export class NotFoundError extends TutoringError {
  readonly resource: string;
  readonly resourceId: string | number;

  constructor(resource: string, id: string | number) {
    super('not_found', `${resource} with ID '${id}' not found`, {
      details: { resource, id },
    });
    this.name = 'NotFoundError';
    this.resource = resource;
    this.resourceId = id;
  }
}

export class ConflictError extends TutoringError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('conflict', message, { details });
    this.name = 'ConflictError';
  }
}

export class SessionNotActiveError extends TutoringError {
  constructor(sessionId: string, status: string) {
    super('session_not_active', `Session '${sessionId}' is ${status} and no longer accepts input`, {
      details: { sessionId, status },
    });
    this.name = 'SessionNotActiveError';
  }
}

export class ContextUnavailableError extends TutoringError {
  constructor(message: string, cause?: unknown) {
    super('context_unavailable', message, { cause });
    this.name = 'ContextUnavailableError';
  }
}

export class GenerationFailureError extends TutoringError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super('generation_failure', message, { cause, details: { attempts } });
    this.name = 'GenerationFailureError';
    this.attempts = attempts;
  }
}

export class ConversationInvariantError extends TutoringError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('conversation_invariant', message, { details });
    this.name = 'ConversationInvariantError';
  }
}
