/**
 * Session Repository Implementation
 *
 * This module provides data access operations for tutoring sessions,
 * abstracting Drizzle ORM queries from business logic. It handles the
 * mapping between database rows and domain models.
 *
 * Status changes go through `transition`, an optimistic update that only
 * matches rows still in 'active'. Terminal sessions can therefore never be
 * resurrected or moved between terminal states, whatever the caller does.
 */

import { and, desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionContexts, sessionTurns, tutoringSessions } from '../schema';
import type { NotificationStatus, Session, SessionContext, SessionStatus } from '@/core/models';
import type { Repository } from './base';
import {
  mapContextRow,
  toContextRow,
  type CreateSessionContextInput,
} from './session-context.repository';

/**
 * Input type for creating a new Session.
 * Status starts as 'active' with no completion data.
 */
export interface CreateSessionInput {
  /** Unique identifier - a prefixed UUID (e.g., 'sess_abc123') */
  id: string;
  userId: number;
  courseId: number;
  topicId: number;
  /** When the session started (defaults to now if not provided) */
  startedAt?: Date;
}

/**
 * Everything a new session is created with: the session row, the context
 * snapshot and the system turn (sequence 1).
 */
export interface StartSessionRecordsInput {
  session: CreateSessionInput;
  context: Omit<CreateSessionContextInput, 'sessionId'>;
  systemTurn: { id: string; content: string };
}

/**
 * Terminal status a session can move to.
 */
export type TerminalStatus = Exclude<SessionStatus, 'active'>;

/**
 * Maps a database row to a Session domain model.
 */
export function mapSessionRow(row: typeof tutoringSessions.$inferSelect): Session {
  return {
    id: row.id,
    userId: row.userId,
    courseId: row.courseId,
    topicId: row.topicId,
    status: row.status,
    // Drizzle's timestamp_ms mode already returns Date objects
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    endedAt: row.endedAt,
    notificationStatus: row.notificationStatus,
  };
}

/**
 * Repository for tutoring session data access.
 *
 * @example
 * ```typescript
 * const repo = new SessionRepository(db);
 *
 * const session = await repo.create({
 *   id: 'sess_' + crypto.randomUUID(),
 *   userId: 1,
 *   courseId: 2,
 *   topicId: 5,
 * });
 *
 * const completed = await repo.transition(session.id, 'completed', new Date());
 * ```
 */
export class SessionRepository implements Repository<Session, CreateSessionInput> {
  /**
   * @param db - The Drizzle database instance to use for queries
   */
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Session | null> {
    const result = await this.db
      .select()
      .from(tutoringSessions)
      .where(eq(tutoringSessions.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapSessionRow(result[0]);
  }

  /**
   * Finds the active session for a (user, topic, course) triple.
   * At most one should exist; the oldest wins if several do.
   */
  async findActiveFor(userId: number, topicId: number, courseId: number): Promise<Session | null> {
    const result = await this.db
      .select()
      .from(tutoringSessions)
      .where(
        and(
          eq(tutoringSessions.userId, userId),
          eq(tutoringSessions.topicId, topicId),
          eq(tutoringSessions.courseId, courseId),
          eq(tutoringSessions.status, 'active')
        )
      )
      .orderBy(tutoringSessions.startedAt)
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapSessionRow(result[0]);
  }

  /**
   * Lists a learner's sessions, most recent first.
   */
  async findByUser(userId: number, status?: SessionStatus): Promise<Session[]> {
    const condition = status
      ? and(eq(tutoringSessions.userId, userId), eq(tutoringSessions.status, status))
      : eq(tutoringSessions.userId, userId);

    const results = await this.db
      .select()
      .from(tutoringSessions)
      .where(condition)
      .orderBy(desc(tutoringSessions.startedAt));

    return results.map(mapSessionRow);
  }

  async create(input: CreateSessionInput): Promise<Session> {
    const result = await this.db
      .insert(tutoringSessions)
      .values({
        id: input.id,
        userId: input.userId,
        courseId: input.courseId,
        topicId: input.topicId,
        status: 'active',
        notificationStatus: 'not_required',
        startedAt: input.startedAt ?? new Date(),
        completedAt: null,
        endedAt: null,
      })
      .returning();

    return mapSessionRow(result[0]);
  }

  /**
   * Creates the session, its context snapshot and its system turn in one
   * transaction. Either all three rows exist afterwards or none does.
   */
  createWithContext(input: StartSessionRecordsInput): { session: Session; context: SessionContext } {
    const startedAt = input.session.startedAt ?? new Date();

    return this.db.transaction((tx) => {
      const sessionRow = tx
        .insert(tutoringSessions)
        .values({
          id: input.session.id,
          userId: input.session.userId,
          courseId: input.session.courseId,
          topicId: input.session.topicId,
          status: 'active',
          notificationStatus: 'not_required',
          startedAt,
          completedAt: null,
          endedAt: null,
        })
        .returning()
        .get();

      const contextRow = tx
        .insert(sessionContexts)
        .values(toContextRow({ ...input.context, sessionId: input.session.id }))
        .returning()
        .get();

      tx.insert(sessionTurns)
        .values({
          id: input.systemTurn.id,
          sessionId: input.session.id,
          role: 'system',
          content: input.systemTurn.content,
          sequence: 1,
          createdAt: startedAt,
        })
        .run();

      return { session: mapSessionRow(sessionRow), context: mapContextRow(contextRow) };
    });
  }

  /**
   * Moves an active session to a terminal status.
   *
   * Completing sets completedAt and endedAt and marks the notification as
   * pending; abandoning sets endedAt only.
   *
   * @returns The updated session, or null if it was not active (or missing)
   */
  async transition(id: string, to: TerminalStatus, at: Date = new Date()): Promise<Session | null> {
    const changes =
      to === 'completed'
        ? { status: to, completedAt: at, endedAt: at, notificationStatus: 'pending' as const }
        : { status: to, endedAt: at };

    const result = await this.db
      .update(tutoringSessions)
      .set(changes)
      .where(and(eq(tutoringSessions.id, id), eq(tutoringSessions.status, 'active')))
      .returning();

    if (result.length === 0) {
      return null;
    }

    return mapSessionRow(result[0]);
  }

  /**
   * Records the outcome of a completion notification.
   *
   * @throws Error if the session does not exist
   */
  async setNotificationStatus(id: string, status: NotificationStatus): Promise<Session> {
    const result = await this.db
      .update(tutoringSessions)
      .set({ notificationStatus: status })
      .where(eq(tutoringSessions.id, id))
      .returning();

    if (result.length === 0) {
      throw new Error(`Session with id '${id}' not found`);
    }

    return mapSessionRow(result[0]);
  }
}
