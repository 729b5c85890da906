/**
 * Session Domain Types
 *
 * A Session is one tutoring conversation about a single topic of a single
 * course, for a single learner. The learner, course and topic are owned by
 * the upstream progress service and referenced here by their numeric ids.
 *
 * The conversation itself is a list of Turns:
 *
 * 1. A single system turn carrying the rendered tutor instructions
 * 2. An opening assistant turn generated right after the session starts
 * 3. Free-form user/assistant exchanges until the tutor signals completion
 *    or the learner abandons the session
 *
 * This module contains only pure TypeScript types with no runtime dependencies,
 * forming the contract between all modules that work with sessions.
 */

/**
 * Lifecycle status of a Session.
 *
 * - 'active': the conversation is open and accepts new messages
 * - 'completed': the tutor emitted the completion marker; terminal
 * - 'abandoned': the learner left before completion; terminal
 *
 * Only 'active' → 'completed' and 'active' → 'abandoned' are valid.
 */
export type SessionStatus = 'active' | 'completed' | 'abandoned';

/**
 * Delivery state of the completion notification sent upstream.
 *
 * - 'not_required': the session is active or was abandoned
 * - 'pending': the session completed and the notification is in flight
 * - 'delivered': the upstream acknowledged the completion
 * - 'failed': every attempt failed; the session can be redelivered later
 */
export type NotificationStatus = 'not_required' | 'pending' | 'delivered' | 'failed';

/**
 * Role of a participant in the conversation.
 */
export type TurnRole = 'system' | 'user' | 'assistant';

/**
 * A single entry in a session's conversation.
 *
 * Turns are append-only. The assistant content is stored exactly as the
 * model produced it, so it may still contain the completion marker; every
 * read path that leaves the core strips it.
 *
 * @example
 * ```typescript
 * const turn: Turn = {
 *   id: 'turn_5f0c…',
 *   sessionId: 'sess_abc123',
 *   role: 'user',
 *   content: 'Uma variável guarda um valor?',
 *   sequence: 3,
 *   createdAt: new Date('2025-01-13T10:30:00Z'),
 * };
 * ```
 */
export interface Turn {
  /** Unique identifier, `turn_<uuid>` */
  id: string;
  /** Session this turn belongs to */
  sessionId: string;
  role: TurnRole;
  content: string;
  /** 1-based position in the conversation; the system turn is always 1 */
  sequence: number;
  createdAt: Date;
}

/**
 * A tutoring session record.
 *
 * `completedAt` is set if and only if the status is 'completed'.
 * `endedAt` is set for both terminal states.
 */
export interface Session {
  /** Unique identifier, `sess_<uuid>` */
  id: string;
  /** Learner id in the upstream service */
  userId: number;
  /** Course id in the upstream service */
  courseId: number;
  /** Topic id in the upstream service */
  topicId: number;
  status: SessionStatus;
  startedAt: Date;
  completedAt: Date | null;
  endedAt: Date | null;
  notificationStatus: NotificationStatus;
}
