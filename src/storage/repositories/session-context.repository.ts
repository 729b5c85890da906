/**
 * SessionContext Repository Implementation
 *
 * Stores the upstream snapshot a session was started with. Rows are written
 * once and never updated; the prompt of a running session must not drift
 * when the upstream data changes.
 */

import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionContexts } from '../schema';
import type { SessionContext } from '@/core/models';

export type CreateSessionContextInput = Omit<SessionContext, 'capturedAt'> & {
  capturedAt?: Date;
};

/**
 * Maps a database row to a SessionContext domain model.
 */
export function mapContextRow(row: typeof sessionContexts.$inferSelect): SessionContext {
  return {
    sessionId: row.sessionId,
    userLevel: row.userLevel,
    completedTopicIds: row.completedTopicIds,
    struggleTopics: row.struggleTopics,
    courseTitle: row.courseTitle,
    topicTitle: row.topicTitle,
    topicDescription: row.topicDescription,
    learningObjectives: row.learningObjectives,
    promptTemplate: row.promptTemplate,
    capturedAt: row.capturedAt,
  };
}

/**
 * Converts the input into an insertable row.
 */
export function toContextRow(input: CreateSessionContextInput): typeof sessionContexts.$inferInsert {
  return {
    ...input,
    capturedAt: input.capturedAt ?? new Date(),
  };
}

/**
 * Read access to context snapshots; they are inserted together with their
 * session by `SessionRepository.createWithContext`.
 */
export class SessionContextRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Looks up the snapshot by session id.
   */
  async findById(sessionId: string): Promise<SessionContext | null> {
    const result = await this.db
      .select()
      .from(sessionContexts)
      .where(eq(sessionContexts.sessionId, sessionId))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapContextRow(result[0]);
  }
}
