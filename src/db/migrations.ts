/**
 * Schema migrations for the pgvector engine.
 *
 * Idempotent DDL run once at startup, before the first query.
 */

import type postgres from 'postgres';
import { logger, errorMessage } from '@/lib/logger';

const log = logger.child({ layer: 'db', service: 'Migrations' });

// =============================================================================
// SQL Statements
// =============================================================================

const ENABLE_PGVECTOR = `
CREATE EXTENSION IF NOT EXISTS vector;
`;

const CREATE_COLLECTION_ENTRIES_TABLE = `
CREATE TABLE IF NOT EXISTS collection_entries (
  collection VARCHAR(100) NOT NULL,
  id VARCHAR(500) NOT NULL,
  document TEXT NOT NULL,
  metadata JSONB NOT NULL DEFAULT '{}',
  embedding vector(1536) NOT NULL,
  created_at TIMESTAMPTZ DEFAULT NOW(),
  PRIMARY KEY (collection, id)
);

CREATE INDEX IF NOT EXISTS idx_collection_entries_collection ON collection_entries(collection);
`;

/**
 * HNSW index for cosine nearest-neighbor search. Unlike IVFFlat it can be
 * built on an empty table.
 */
const CREATE_VECTOR_INDEX = `
CREATE INDEX IF NOT EXISTS idx_collection_entries_embedding
ON collection_entries
USING hnsw (embedding vector_cosine_ops);
`;

// =============================================================================
// Runner
// =============================================================================

export interface MigrationResult {
  migrationsRun: string[];
  durationMs: number;
}

/**
 * Run all migrations. Throws on the first failing statement.
 */
export async function runMigrations(sql: postgres.Sql): Promise<MigrationResult> {
  const startTime = Date.now();
  const migrationsRun: string[] = [];

  const steps: Array<[string, string]> = [
    ['pgvector_extension', ENABLE_PGVECTOR],
    ['collection_entries_table', CREATE_COLLECTION_ENTRIES_TABLE],
    ['vector_index', CREATE_VECTOR_INDEX],
  ];

  for (const [name, statement] of steps) {
    try {
      await sql.unsafe(statement);
      migrationsRun.push(name);
    } catch (error) {
      log.error({ migration: name, error: errorMessage(error) }, 'Migration failed');
      throw error;
    }
  }

  const durationMs = Date.now() - startTime;
  log.info({ migrations: migrationsRun, duration_ms: durationMs }, 'Migrations complete');

  return { migrationsRun, durationMs };
}
