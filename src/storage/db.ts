/**
 * Database Connection Factory for topic-tutor
 *
 * This module provides database connection utilities using better-sqlite3
 * with Drizzle ORM. It creates properly configured database instances with
 * foreign key enforcement enabled and the schema migrated.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const db = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import * as schema from './schema';

/**
 * Folder of the migrations generated by drizzle-kit (`npm run db:generate`).
 */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

/**
 * Opens the raw SQLite connection with the pragmas the application relies on.
 *
 * @param dbPath - File path, or ':memory:' for an in-memory database
 */
export function openSqlite(dbPath: string): Database.Database {
  const sqlite = new Database(dbPath);

  // SQLite has foreign keys disabled by default; turns and contexts
  // reference their session.
  sqlite.pragma('foreign_keys = ON');

  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  return sqlite;
}

/**
 * Creates a new Drizzle ORM database instance connected to the specified
 * SQLite file, applying any pending migrations first.
 *
 * @param dbPath - Path to the SQLite database file.
 *                 Use ':memory:' for an in-memory database (useful for testing).
 * @returns A Drizzle ORM database instance with full schema awareness.
 *          The raw connection is available as `db.$client`.
 *
 * @example
 * const db = createDatabase('/var/data/topic-tutor.db');
 */
export function createDatabase(dbPath: string = 'topic-tutor.db') {
  const db = drizzle(openSqlite(dbPath), { schema });

  // Tracked in __drizzle_migrations; only pending migrations run.
  migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });

  return db;
}

/**
 * Type alias for the Drizzle database instance.
 *
 * Use this type when you need to pass the database as a parameter
 * or store it in a variable with proper typing.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;
