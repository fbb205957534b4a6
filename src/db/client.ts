/**
 * Drizzle ORM Database Client
 *
 * Connection for the pgvector engine. One pool per process.
 */

import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { logger } from '@/lib/logger';
import * as schema from './schema';

// Create a child logger for database operations
const log = logger.child({ layer: 'db', service: 'DatabaseClient' });

// =============================================================================
// Types
// =============================================================================

export type VectorDatabase = PostgresJsDatabase<typeof schema>;

// =============================================================================
// Client
// =============================================================================

let dbClient: postgres.Sql | null = null;
let db: VectorDatabase | null = null;

/**
 * Get the Drizzle client, connecting on first use.
 *
 * @param connectionString - Falls back to DATABASE_URL
 */
export function getDb(connectionString = process.env.DATABASE_URL): VectorDatabase {
  if (db) {
    return db;
  }

  if (!connectionString) {
    throw new Error(
      'DATABASE_URL environment variable is not set. ' +
      'Set it to use the pgvector engine, or unset it to use the local engine.'
    );
  }

  dbClient = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  db = drizzle(dbClient, { schema });
  log.debug('Created database connection');

  return db;
}

/**
 * Get the raw postgres-js client for DDL. Connects on first use.
 */
export function getSqlClient(connectionString = process.env.DATABASE_URL): postgres.Sql {
  getDb(connectionString);
  if (!dbClient) {
    throw new Error('Database client failed to initialize');
  }
  return dbClient;
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

/**
 * Close the database connection.
 * Call this during application shutdown.
 */
export async function closeDb(): Promise<void> {
  if (dbClient) {
    await dbClient.end();
    dbClient = null;
    db = null;
    log.info('Database connection closed');
  }
}
