/**
 * Database schema for the pgvector engine.
 *
 * Every logical collection shares one table; rows are keyed by
 * (collection, id).
 */

import {
  pgTable,
  varchar,
  text,
  jsonb,
  timestamp,
  index,
  primaryKey,
  customType,
} from 'drizzle-orm/pg-core';
import type { Metadata } from '@/lib/vector/types';

// =============================================================================
// Custom Type: pgvector
// =============================================================================

/**
 * Custom type for pgvector embeddings.
 * Stores vectors as float arrays, serializes to/from pgvector format.
 */
export const vector = customType<{
  data: number[];
  driverData: string;
  config: { dimensions: number };
}>({
  dataType(config) {
    return `vector(${config?.dimensions ?? 1536})`;
  },
  toDriver(value: number[]): string {
    return `[${value.join(',')}]`;
  },
  fromDriver(value: string): number[] {
    // Parse pgvector format: [0.1,0.2,0.3,...]
    return value.slice(1, -1).split(',').map(Number);
  },
});

// =============================================================================
// Collection Entries Table
// =============================================================================

export const collectionEntries = pgTable('collection_entries', {
  collection: varchar('collection', { length: 100 }).notNull(),
  id: varchar('id', { length: 500 }).notNull(),
  document: text('document').notNull(),
  metadata: jsonb('metadata').$type<Metadata>().notNull().default({}),

  // 1536 dimensions for OpenAI text-embedding-3-small
  embedding: vector('embedding', { dimensions: 1536 }).notNull(),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => ({
  pk: primaryKey({ columns: [table.collection, table.id] }),
  collectionIdx: index('idx_collection_entries_collection').on(table.collection),
  // Note: HNSW index for vector search is created via raw SQL migration
}));

// =============================================================================
// Types (inferred from schema)
// =============================================================================

export type CollectionEntry = typeof collectionEntries.$inferSelect;
export type NewCollectionEntry = typeof collectionEntries.$inferInsert;
