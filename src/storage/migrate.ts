/**
 * Database Migration Script for topic-tutor
 *
 * Applies pending Drizzle migrations from ./drizzle to the configured
 * SQLite database and prints the resulting tables. Applied migrations are
 * tracked in the __drizzle_migrations table, so running it again only
 * applies new ones.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run cli -- migrate
 */

import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import { MIGRATIONS_FOLDER, openSqlite } from './db';

/**
 * Runs migrations against `dbPath` and logs a summary.
 */
export function migrateDatabase(dbPath: string): void {
  console.log(`[Migrate] Database path: ${dbPath}`);
  console.log(`[Migrate] Migrations folder: ${MIGRATIONS_FOLDER}`);

  const sqlite = openSqlite(dbPath);

  try {
    migrate(drizzle(sqlite), { migrationsFolder: MIGRATIONS_FOLDER });
    console.log('[Migrate] Migrations completed successfully.');

    const tables = sqlite
      .prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name != '__drizzle_migrations' ORDER BY name"
      )
      .pluck()
      .all();

    console.log('[Migrate] Tables in database:');
    for (const table of tables) {
      console.log(`  - ${String(table)}`);
    }
  } finally {
    sqlite.close();
  }
}
