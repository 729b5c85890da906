/**
 * Database Schema Definitions for topic-tutor
 *
 * This file contains Drizzle ORM schema definitions for SQLite.
 * Migrations in ./drizzle are generated from it with `npm run db:generate`.
 *
 * - Tutoring Sessions: one row per tutoring conversation
 * - Session Turns: the append-only conversation of each session
 * - Session Contexts: the upstream snapshot captured at session start
 *
 * All timestamps are stored as milliseconds since epoch (integer) for
 * SQLite compatibility and precise ordering.
 */

import { sql } from 'drizzle-orm';
import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/sqlite-core';

/**
 * Tutoring Sessions Table
 *
 * Status values:
 * - 'active': conversation open
 * - 'completed': tutor emitted the completion marker
 * - 'abandoned': learner left
 *
 * completed_at is set only for completed sessions; ended_at for both
 * terminal states.
 */
export const tutoringSessions = sqliteTable(
  'tutoring_sessions',
  {
    // Prefixed UUID, e.g. 'sess_…'
    id: text('id').primaryKey(),

    // Upstream identifiers
    userId: integer('user_id').notNull(),
    courseId: integer('course_id').notNull(),
    topicId: integer('topic_id').notNull(),

    status: text('status', { enum: ['active', 'completed', 'abandoned'] })
      .notNull()
      .default('active'),

    // Delivery state of the upstream completion notification
    notificationStatus: text('notification_status', {
      enum: ['not_required', 'pending', 'delivered', 'failed'],
    })
      .notNull()
      .default('not_required'),

    startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
    completedAt: integer('completed_at', { mode: 'timestamp_ms' }),
    endedAt: integer('ended_at', { mode: 'timestamp_ms' }),
  },
  (table) => ({
    // Lookup of the active session for a (user, topic, course) triple
    ownerIdx: index('tutoring_sessions_owner_idx').on(
      table.userId,
      table.topicId,
      table.courseId,
      table.status
    ),
    statusCheck: check(
      'tutoring_sessions_status_check',
      sql`${table.status} IN ('active', 'completed', 'abandoned')`
    ),
    notificationStatusCheck: check(
      'tutoring_sessions_notification_status_check',
      sql`${table.notificationStatus} IN ('not_required', 'pending', 'delivered', 'failed')`
    ),
    // Exactly the completed sessions carry a completion time
    completedAtCheck: check(
      'tutoring_sessions_completed_at_check',
      sql`(${table.status} = 'completed') = (${table.completedAt} IS NOT NULL)`
    ),
  })
);

/**
 * Session Turns Table
 *
 * Ordered, append-only conversation. sequence is 1-based and unique per
 * session; the system turn is always sequence 1.
 */
export const sessionTurns = sqliteTable(
  'session_turns',
  {
    id: text('id').primaryKey(),

    sessionId: text('session_id')
      .notNull()
      .references(() => tutoringSessions.id),

    role: text('role', { enum: ['system', 'user', 'assistant'] }).notNull(),

    // Raw content; assistant turns may contain the completion marker
    content: text('content').notNull(),

    sequence: integer('sequence').notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    sessionSequenceIdx: uniqueIndex('session_turns_session_sequence_idx').on(
      table.sessionId,
      table.sequence
    ),
    roleCheck: check('session_turns_role_check', sql`${table.role} IN ('system', 'user', 'assistant')`),
  })
);

/**
 * Session Contexts Table
 *
 * Snapshot of the upstream user and topic data, one row per session,
 * written once when the session starts.
 */
export const sessionContexts = sqliteTable('session_contexts', {
  sessionId: text('session_id')
    .primaryKey()
    .references(() => tutoringSessions.id),

  userLevel: text('user_level'),

  completedTopicIds: text('completed_topic_ids', { mode: 'json' })
    .$type<number[]>()
    .notNull(),

  struggleTopics: text('struggle_topics', { mode: 'json' })
    .$type<string[]>()
    .notNull(),

  courseTitle: text('course_title').notNull(),
  topicTitle: text('topic_title').notNull(),
  topicDescription: text('topic_description').notNull(),
  learningObjectives: text('learning_objectives'),
  promptTemplate: text('prompt_template'),

  capturedAt: integer('captured_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Type exports for use throughout the application
 * These types are inferred from the schema for type-safe database operations
 */
export type TutoringSessionRow = typeof tutoringSessions.$inferSelect;
export type NewTutoringSessionRow = typeof tutoringSessions.$inferInsert;

export type SessionTurnRow = typeof sessionTurns.$inferSelect;
export type NewSessionTurnRow = typeof sessionTurns.$inferInsert;

export type SessionContextRow = typeof sessionContexts.$inferSelect;
export type NewSessionContextRow = typeof sessionContexts.$inferInsert;
