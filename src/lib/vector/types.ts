/**
 * Vector engine contract.
 *
 * An engine stores named collections of documents with metadata and answers
 * nearest-neighbor queries by text. Embedding is the engine's concern.
 */

// =============================================================================
// Types
// =============================================================================

export type MetadataValue = string | number | boolean;
export type Metadata = Record<string, MetadataValue>;

/**
 * Equality filter on metadata. `$and` combines several equality filters.
 */
export type WhereFilter =
  | { [key: string]: MetadataValue }
  | { $and: Array<{ [key: string]: MetadataValue }> };

export interface VectorRecord {
  id: string;
  document: string;
  metadata: Metadata;
}

export interface QueryMatch extends VectorRecord {
  /** Cosine distance, lower is closer */
  distance: number;
}

export interface VectorCollection {
  readonly name: string;
  /** Insert records; existing ids are overwritten */
  add(records: VectorRecord[]): Promise<void>;
  /** Insert or replace records by id */
  upsert(records: VectorRecord[]): Promise<void>;
  /** Nearest neighbors of the query text, closest first */
  query(text: string, nResults: number, where?: WhereFilter): Promise<QueryMatch[]>;
  /** Records by id, or every record when ids are omitted */
  get(ids?: string[]): Promise<VectorRecord[]>;
  count(): Promise<number>;
}

export interface VectorClient {
  getOrCreateCollection(name: string): VectorCollection;
  deleteCollection(name: string): Promise<void>;
}

// =============================================================================
// Filter Helpers
// =============================================================================

/**
 * Flatten a filter into key/value equality conditions.
 */
export function filterConditions(where?: WhereFilter): Array<[string, MetadataValue]> {
  if (!where) return [];
  if ('$and' in where && Array.isArray(where.$and)) {
    return where.$and.flatMap((clause) => Object.entries(clause));
  }
  return Object.entries(where).filter(
    (entry): entry is [string, MetadataValue] => !Array.isArray(entry[1])
  );
}

/**
 * Whether metadata satisfies every condition of a filter.
 */
export function matchesFilter(metadata: Metadata, where?: WhereFilter): boolean {
  return filterConditions(where).every(([key, value]) => metadata[key] === value);
}
