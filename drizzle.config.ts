/**
 * Drizzle Kit Configuration
 *
 * Used by `npm run db:generate` to write migrations for schema changes
 * into ./drizzle; `npm run db:migrate` applies them.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',

  // Generated migrations, applied at startup by createDatabase()
  out: './drizzle',

  dialect: 'sqlite',

  dbCredentials: {
    url: process.env.DATABASE_PATH || './topic-tutor.db',
  },

  verbose: true,
  strict: true,
});
