/**
 * Local Vector Client
 *
 * In-process vector engine with brute-force cosine search.
 * When constructed with a directory, each collection is snapshotted to
 * `<directory>/<collection>.json` after every write and reloaded on first use.
 */

import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { z } from 'zod';
import { logger, logDbOperation, errorMessage } from '@/lib/logger';
import type { EmbeddingProvider } from '@/lib/rag/embeddings';
import {
  matchesFilter,
  type QueryMatch,
  type VectorClient,
  type VectorCollection,
  type VectorRecord,
  type WhereFilter,
} from './types';

const log = logger.child({ layer: 'db', service: 'LocalVectorClient' });

// =============================================================================
// Snapshot Format
// =============================================================================

const storedRecordSchema = z.object({
  id: z.string(),
  document: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
  embedding: z.array(z.number()),
});

const snapshotSchema = z.object({
  records: z.array(storedRecordSchema),
});

type StoredRecord = z.infer<typeof storedRecordSchema>;

// =============================================================================
// Math
// =============================================================================

/**
 * Cosine distance in [0, 2]. A zero vector is treated as orthogonal to everything.
 */
export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// =============================================================================
// Collection
// =============================================================================

class LocalCollection implements VectorCollection {
  private records = new Map<string, StoredRecord>();
  private loadPromise: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly embedder: EmbeddingProvider,
    private readonly snapshotPath: string | null
  ) {}

  async add(records: VectorRecord[]): Promise<void> {
    await this.write('add', records);
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    await this.write('upsert', records);
  }

  async query(text: string, nResults: number, where?: WhereFilter): Promise<QueryMatch[]> {
    await this.ensureLoaded();
    const start = Date.now();

    const candidates = [...this.records.values()].filter((record) =>
      matchesFilter(record.metadata, where)
    );
    if (candidates.length === 0 || nResults <= 0) return [];

    const { embeddings } = await this.embedder.embedBatch([text]);
    const queryEmbedding = embeddings[0];

    const matches = candidates
      .map((record) => ({
        id: record.id,
        document: record.document,
        metadata: record.metadata,
        distance: cosineDistance(queryEmbedding, record.embedding),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, nResults);

    logDbOperation(log, 'query', {
      collection: this.name,
      rows: matches.length,
      duration_ms: Date.now() - start,
    });

    return matches;
  }

  async get(ids?: string[]): Promise<VectorRecord[]> {
    await this.ensureLoaded();
    const selected = ids
      ? ids.flatMap((id) => {
          const record = this.records.get(id);
          return record ? [record] : [];
        })
      : [...this.records.values()];

    return selected.map(({ id, document, metadata }) => ({ id, document, metadata }));
  }

  async count(): Promise<number> {
    await this.ensureLoaded();
    return this.records.size;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async write(operation: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.ensureLoaded();
    const start = Date.now();

    const { embeddings } = await this.embedder.embedBatch(records.map((r) => r.document));
    records.forEach((record, index) => {
      this.records.set(record.id, { ...record, embedding: embeddings[index] });
    });

    await this.persist();

    logDbOperation(log, operation, {
      collection: this.name,
      rows: records.length,
      duration_ms: Date.now() - start,
    });
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loadPromise) {
      this.loadPromise = this.load();
    }
    return this.loadPromise;
  }

  private async load(): Promise<void> {
    if (!this.snapshotPath) return;

    let raw: string;
    try {
      raw = await readFile(this.snapshotPath, 'utf-8');
    } catch (error) {
      // Missing snapshot means a new collection
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
      throw error;
    }

    const parsed = snapshotSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Corrupt vector snapshot for collection '${this.name}': ${parsed.error.message}`);
    }

    for (const record of parsed.data.records) {
      this.records.set(record.id, record);
    }
    log.debug({ collection: this.name, rows: this.records.size }, 'Snapshot loaded');
  }

  private async persist(): Promise<void> {
    if (!this.snapshotPath) return;
    const snapshot = { records: [...this.records.values()] };
    await mkdir(dirname(this.snapshotPath), { recursive: true });
    await writeFile(this.snapshotPath, JSON.stringify(snapshot), 'utf-8');
  }
}

// =============================================================================
// Client
// =============================================================================

export interface LocalVectorClientOptions {
  /** Directory for collection snapshots; omit to keep everything in memory */
  path?: string;
}

export class LocalVectorClient implements VectorClient {
  private collections = new Map<string, LocalCollection>();
  private readonly directory: string | null;

  constructor(
    private readonly embedder: EmbeddingProvider,
    options: LocalVectorClientOptions = {}
  ) {
    this.directory = options.path ?? null;
  }

  getOrCreateCollection(name: string): VectorCollection {
    const existing = this.collections.get(name);
    if (existing) return existing;

    const collection = new LocalCollection(name, this.embedder, this.snapshotPath(name));
    this.collections.set(name, collection);
    return collection;
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.delete(name);
    const path = this.snapshotPath(name);
    if (!path) return;

    try {
      await rm(path, { force: true });
    } catch (error) {
      log.error({ collection: name, error: errorMessage(error) }, 'Failed to delete snapshot');
      throw error;
    }
  }

  private snapshotPath(name: string): string | null {
    return this.directory ? join(this.directory, `${name}.json`) : null;
  }
}
