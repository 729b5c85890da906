/**
 * SessionTurn Repository Implementation
 *
 * Data access for the append-only conversation of a session. Sequence
 * numbers are assigned by the database inside the INSERT itself
 * (`MAX(sequence) + 1` for the session), and a unique index on
 * (session_id, sequence) rejects any duplicate that could slip through.
 */

import { and, asc, count, desc, eq, ne, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionTurns } from '../schema';
import type { Turn, TurnRole } from '@/core/models';

/**
 * Input type for appending a turn.
 */
export interface AppendTurnInput {
  /** Unique identifier - a prefixed UUID (e.g., 'turn_abc123') */
  id: string;
  sessionId: string;
  role: TurnRole;
  content: string;
  /** Defaults to now */
  createdAt?: Date;
}

/**
 * Maps a database row to a Turn domain model.
 */
export function mapTurnRow(row: typeof sessionTurns.$inferSelect): Turn {
  return {
    id: row.id,
    sessionId: row.sessionId,
    role: row.role,
    content: row.content,
    sequence: row.sequence,
    createdAt: row.createdAt,
  };
}

/**
 * SQL expression for the next sequence number of a session.
 */
export function nextSequenceFor(sessionId: string) {
  return sql<number>`(SELECT COALESCE(MAX(${sessionTurns.sequence}), 0) + 1 FROM ${sessionTurns} WHERE ${sessionTurns.sessionId} = ${sessionId})`;
}

/**
 * Repository for conversation turns.
 *
 * @example
 * ```typescript
 * const repo = new SessionTurnRepository(db);
 * const turn = await repo.append({
 *   id: 'turn_' + crypto.randomUUID(),
 *   sessionId: 'sess_abc123',
 *   role: 'user',
 *   content: 'What is a variable?',
 * });
 * console.log(turn.sequence);
 * ```
 */
export class SessionTurnRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Appends a turn at the next sequence position.
   */
  async append(input: AppendTurnInput): Promise<Turn> {
    const result = await this.db
      .insert(sessionTurns)
      .values({
        id: input.id,
        sessionId: input.sessionId,
        role: input.role,
        content: input.content,
        sequence: nextSequenceFor(input.sessionId),
        createdAt: input.createdAt ?? new Date(),
      })
      .returning();

    return mapTurnRow(result[0]);
  }

  /**
   * All turns of a session in sequence order.
   */
  async findBySession(sessionId: string): Promise<Turn[]> {
    const results = await this.db
      .select()
      .from(sessionTurns)
      .where(eq(sessionTurns.sessionId, sessionId))
      .orderBy(asc(sessionTurns.sequence));

    return results.map(mapTurnRow);
  }

  /**
   * The session's system turn, if it has one.
   */
  async findSystemTurn(sessionId: string): Promise<Turn | null> {
    const result = await this.db
      .select()
      .from(sessionTurns)
      .where(and(eq(sessionTurns.sessionId, sessionId), eq(sessionTurns.role, 'system')))
      .orderBy(asc(sessionTurns.sequence))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapTurnRow(result[0]);
  }

  /**
   * The most recent non-system turns, returned oldest first.
   *
   * @param limit - Maximum number of turns; 0 returns an empty list
   */
  async findRecentConversation(sessionId: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) {
      return [];
    }

    const results = await this.db
      .select()
      .from(sessionTurns)
      .where(and(eq(sessionTurns.sessionId, sessionId), ne(sessionTurns.role, 'system')))
      .orderBy(desc(sessionTurns.sequence))
      .limit(limit);

    return results.map(mapTurnRow).reverse();
  }

  /**
   * Number of turns, optionally of one role.
   */
  async count(sessionId: string, role?: TurnRole): Promise<number> {
    const condition = role
      ? and(eq(sessionTurns.sessionId, sessionId), eq(sessionTurns.role, role))
      : eq(sessionTurns.sessionId, sessionId);

    const result = await this.db
      .select({ value: count() })
      .from(sessionTurns)
      .where(condition);

    return result[0]?.value ?? 0;
  }
}
