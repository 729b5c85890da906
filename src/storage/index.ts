/**
 * Storage Module - Barrel Export
 *
 * Public API of the storage layer: connection factory, migrations, table
 * definitions and repositories.
 *
 * Usage:
 *   import { createDatabase, SessionRepository } from '@/storage';
 *   const db = createDatabase(config.database.path);
 *   const sessions = new SessionRepository(db);
 */

// Database connection factory
export { createDatabase, openSqlite, MIGRATIONS_FOLDER } from './db';
export type { AppDatabase } from './db';

// Migrations
export { migrateDatabase } from './migrate';

// Table definitions
export { tutoringSessions, sessionTurns, sessionContexts } from './schema';

// Inferred row types
export type {
  TutoringSessionRow,
  NewTutoringSessionRow,
  SessionTurnRow,
  NewSessionTurnRow,
  SessionContextRow,
  NewSessionContextRow,
} from './schema';

// Repositories
export * from './repositories';
