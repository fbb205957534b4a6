/**
 * pgvector Client
 *
 * Vector engine backed by PostgreSQL + pgvector through Drizzle.
 * Collections are rows of one shared table partitioned by a `collection` column.
 */

import { and, eq, inArray, sql, type SQL } from 'drizzle-orm';
import { collectionEntries, getDb, getSqlClient, runMigrations, type VectorDatabase } from '@/db';
import { logger, logDbOperation, errorMessage } from '@/lib/logger';
import type { EmbeddingProvider } from '@/lib/rag/embeddings';
import {
  filterConditions,
  type QueryMatch,
  type VectorClient,
  type VectorCollection,
  type VectorRecord,
  type WhereFilter,
} from './types';

const log = logger.child({ layer: 'db', service: 'PgVectorClient' });

function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

// =============================================================================
// Collection
// =============================================================================

class PgCollection implements VectorCollection {
  constructor(
    readonly name: string,
    private readonly db: VectorDatabase,
    private readonly embedder: EmbeddingProvider,
    private readonly ready: () => Promise<void>
  ) {}

  add(records: VectorRecord[]): Promise<void> {
    return this.write('add', records);
  }

  upsert(records: VectorRecord[]): Promise<void> {
    return this.write('upsert', records);
  }

  async query(text: string, nResults: number, where?: WhereFilter): Promise<QueryMatch[]> {
    await this.ready();
    const start = Date.now();

    try {
      const { embeddings } = await this.embedder.embedBatch([text]);
      const literal = toVectorLiteral(embeddings[0]);
      const distance = sql<number>`${collectionEntries.embedding} <=> ${literal}::vector`.mapWith(Number);

      const rows = await this.db
        .select({
          id: collectionEntries.id,
          document: collectionEntries.document,
          metadata: collectionEntries.metadata,
          distance,
        })
        .from(collectionEntries)
        .where(and(eq(collectionEntries.collection, this.name), ...this.metadataConditions(where)))
        .orderBy(distance)
        .limit(nResults);

      logDbOperation(log, 'query', {
        collection: this.name,
        rows: rows.length,
        duration_ms: Date.now() - start,
      });

      return rows;
    } catch (error) {
      logDbOperation(log, 'query', {
        collection: this.name,
        duration_ms: Date.now() - start,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  async get(ids?: string[]): Promise<VectorRecord[]> {
    await this.ready();
    if (ids && ids.length === 0) return [];

    const conditions = [eq(collectionEntries.collection, this.name)];
    if (ids) {
      conditions.push(inArray(collectionEntries.id, ids));
    }

    const rows = await this.db
      .select({
        id: collectionEntries.id,
        document: collectionEntries.document,
        metadata: collectionEntries.metadata,
      })
      .from(collectionEntries)
      .where(and(...conditions));

    if (!ids) return rows;

    // Preserve requested order
    const byId = new Map(rows.map((row) => [row.id, row]));
    return ids.flatMap((id) => {
      const row = byId.get(id);
      return row ? [row] : [];
    });
  }

  async count(): Promise<number> {
    await this.ready();
    const [row] = await this.db
      .select({ count: sql<number>`count(*)`.mapWith(Number) })
      .from(collectionEntries)
      .where(eq(collectionEntries.collection, this.name));
    return row?.count ?? 0;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private metadataConditions(where?: WhereFilter): SQL[] {
    return filterConditions(where).map(
      ([key, value]) => sql`${collectionEntries.metadata}->>${key} = ${String(value)}`
    );
  }

  private async write(operation: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.ready();
    const start = Date.now();

    try {
      const { embeddings } = await this.embedder.embedBatch(records.map((r) => r.document));

      await this.db
        .insert(collectionEntries)
        .values(
          records.map((record, index) => ({
            collection: this.name,
            id: record.id,
            document: record.document,
            metadata: record.metadata,
            embedding: embeddings[index],
          }))
        )
        .onConflictDoUpdate({
          target: [collectionEntries.collection, collectionEntries.id],
          set: {
            document: sql`excluded.document`,
            metadata: sql`excluded.metadata`,
            embedding: sql`excluded.embedding`,
          },
        });

      logDbOperation(log, operation, {
        collection: this.name,
        rows: records.length,
        duration_ms: Date.now() - start,
      });
    } catch (error) {
      logDbOperation(log, operation, {
        collection: this.name,
        duration_ms: Date.now() - start,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}

// =============================================================================
// Client
// =============================================================================

export class PgVectorClient implements VectorClient {
  private collections = new Map<string, PgCollection>();
  private migrationPromise: Promise<void> | null = null;

  /**
   * @param migrate - Schema setup, run once before the first statement
   */
  constructor(
    private readonly db: VectorDatabase,
    private readonly embedder: EmbeddingProvider,
    private readonly migrate: () => Promise<void> = async () => {}
  ) {}

  getOrCreateCollection(name: string): VectorCollection {
    const existing = this.collections.get(name);
    if (existing) return existing;

    const collection = new PgCollection(name, this.db, this.embedder, () => this.ensureMigrated());
    this.collections.set(name, collection);
    return collection;
  }

  async deleteCollection(name: string): Promise<void> {
    await this.ensureMigrated();
    const start = Date.now();
    await this.db.delete(collectionEntries).where(eq(collectionEntries.collection, name));
    this.collections.delete(name);
    logDbOperation(log, 'delete_collection', { collection: name, duration_ms: Date.now() - start });
  }

  private ensureMigrated(): Promise<void> {
    if (!this.migrationPromise) {
      this.migrationPromise = this.migrate().catch((error: unknown) => {
        // Allow a retry on the next call
        this.migrationPromise = null;
        throw error;
      });
    }
    return this.migrationPromise;
  }
}

/**
 * Connect to DATABASE_URL and run migrations on first use.
 */
export function createPgVectorClient(connectionString: string, embedder: EmbeddingProvider): PgVectorClient {
  const db = getDb(connectionString);
  const sqlClient = getSqlClient(connectionString);
  return new PgVectorClient(db, embedder, async () => {
    await runMigrations(sqlClient);
  });
}
