/**
 * Core Domain Models - Barrel Export
 *
 * Pure types shared by the storage, session, upstream and API layers.
 *
 * @example
 * ```typescript
 * import type { Session, Turn, SessionContext } from '@/core/models';
 * ```
 */

export type {
  SessionStatus,
  NotificationStatus,
  TurnRole,
  Turn,
  Session,
} from './session';

export type { UserContext, TopicSpec, SessionContext } from './context';
