/**
 * Search result container returned by the semantic index.
 */

import type { QueryMatch } from '@/lib/vector/types';

export interface ContentMetadata {
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number | null;
}

export interface SearchResults {
  documents: string[];
  metadata: ContentMetadata[];
  distances: number[];
  /** Set instead of throwing when resolution or the engine fails */
  error: string | null;
}

export function toContentMetadata(match: Pick<QueryMatch, 'metadata'>): ContentMetadata {
  const { course_title, lesson_number, chunk_index } = match.metadata;
  return {
    courseTitle: typeof course_title === 'string' ? course_title : 'unknown',
    lessonNumber: typeof lesson_number === 'number' ? lesson_number : null,
    chunkIndex: typeof chunk_index === 'number' ? chunk_index : null,
  };
}

export function searchResultsFromMatches(matches: QueryMatch[]): SearchResults {
  return {
    documents: matches.map((match) => match.document),
    metadata: matches.map(toContentMetadata),
    distances: matches.map((match) => match.distance),
    error: null,
  };
}

export function emptySearchResults(error: string | null = null): SearchResults {
  return { documents: [], metadata: [], distances: [], error };
}

export function isEmptySearchResults(results: SearchResults): boolean {
  return results.documents.length === 0;
}
