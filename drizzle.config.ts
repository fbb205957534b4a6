import { defineConfig } from 'drizzle-kit';

/**
 * Drizzle Kit Configuration for the pgvector index
 *
 * Generates migrations for the collection_entries table.
 *
 * Usage:
 *   DATABASE_URL=... npx drizzle-kit generate
 */
export default defineConfig({
  schema: './src/db/schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  verbose: true,
  strict: true,
});
