/**
 * Database module exports.
 */

export { getDb, getSqlClient, closeDb } from './client';
export type { VectorDatabase } from './client';
export { runMigrations, type MigrationResult } from './migrations';
export * from './schema';
