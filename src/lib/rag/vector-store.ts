/**
 * Vector Store
 *
 * Semantic index over two collections:
 * - Catalog: one entry per course, id and document = title
 * - Content: one entry per chunk, embedded on the chunk text
 */

import { z } from 'zod';
import type { Course, CourseChunk, CourseMetadata, LessonMetadata } from '@/types/course';
import { logger, logRagStep, errorMessage } from '@/lib/logger';
import type { Metadata, VectorClient, VectorCollection, WhereFilter } from '@/lib/vector/types';
import { CATALOG_COLLECTION, CONTENT_COLLECTION, DEFAULT_MAX_RESULTS } from './config';
import { CourseResolver } from './course-resolver';
import {
  emptySearchResults,
  searchResultsFromMatches,
  type SearchResults,
} from './search-results';

// =============================================================================
// Types
// =============================================================================

export interface SearchParams {
  query: string;
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface VectorStoreOptions {
  maxResults?: number;
  maxCourseDistance?: number;
}

const lessonsSchema = z.array(
  z.object({
    lesson_number: z.number(),
    lesson_title: z.string(),
    lesson_link: z.string().nullable(),
  })
);

/**
 * Parse the serialized lesson list. Malformed data reads as no lessons.
 */
export function parseLessons(raw: unknown): LessonMetadata[] {
  if (typeof raw !== 'string') return [];
  try {
    const parsed = lessonsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

/**
 * Content entry id. The title is percent-encoded so distinct titles never share an id.
 */
export function contentId(chunk: Pick<CourseChunk, 'courseTitle' | 'chunkIndex'>): string {
  return `${encodeURIComponent(chunk.courseTitle)}_${chunk.chunkIndex}`;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' && value ? value : null;
}

// =============================================================================
// Vector Store
// =============================================================================

export class VectorStore {
  private catalog: VectorCollection;
  private content: VectorCollection;
  private readonly resolver: CourseResolver;
  private readonly maxResults: number;
  private log = logger.child({ layer: 'rag', service: 'VectorStore' });

  constructor(
    private readonly client: VectorClient,
    options: VectorStoreOptions = {}
  ) {
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.catalog = client.getOrCreateCollection(CATALOG_COLLECTION);
    this.content = client.getOrCreateCollection(CONTENT_COLLECTION);
    this.resolver = new CourseResolver(() => this.catalog, {
      maxCourseDistance: options.maxCourseDistance,
    });
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Search course content, optionally scoped to a course and/or lesson.
   * Never throws; failures are reported through `error`.
   */
  async search({ query, courseName, lessonNumber, limit }: SearchParams): Promise<SearchResults> {
    const start = Date.now();

    let courseTitle: string | null = null;
    if (courseName) {
      courseTitle = await this.resolver.resolve(courseName);
      if (!courseTitle) {
        return emptySearchResults(`No course found matching '${courseName}'`);
      }
    }

    const where = this.buildFilter(courseTitle, lessonNumber);

    try {
      const matches = await this.content.query(query, limit ?? this.maxResults, where);
      logRagStep(this.log, 'retrieval', {
        duration_ms: Date.now() - start,
        chunks: matches.length,
        course: courseTitle ?? undefined,
      });
      return searchResultsFromMatches(matches);
    } catch (error) {
      const message = errorMessage(error);
      logRagStep(this.log, 'retrieval', { duration_ms: Date.now() - start, error: message });
      return emptySearchResults(`Search error: ${message}`);
    }
  }

  /**
   * Canonical title for a free-text course name.
   */
  resolveCourseName(courseName: string): Promise<string | null> {
    return this.resolver.resolve(courseName);
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Upsert one catalog entry. Callers prevent duplicate titles.
   */
  async addCourseMetadata(course: Course): Promise<void> {
    const lessons: LessonMetadata[] = course.lessons.map((lesson) => ({
      lesson_number: lesson.lessonNumber,
      lesson_title: lesson.title,
      lesson_link: lesson.lessonLink,
    }));

    const metadata: Metadata = {
      title: course.title,
      lesson_count: course.lessons.length,
      lessons_json: JSON.stringify(lessons),
    };
    if (course.instructor) metadata.instructor = course.instructor;
    if (course.courseLink) metadata.course_link = course.courseLink;

    await this.catalog.upsert([{ id: course.title, document: course.title, metadata }]);
  }

  async addCourseContent(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    await this.content.add(
      chunks.map((chunk) => {
        const metadata: Metadata = {
          course_title: chunk.courseTitle,
          chunk_index: chunk.chunkIndex,
        };
        if (chunk.lessonNumber !== null) metadata.lesson_number = chunk.lessonNumber;
        return { id: contentId(chunk), document: chunk.content, metadata };
      })
    );
  }

  /**
   * Drop and recreate both collections.
   */
  async clearAllData(): Promise<void> {
    await this.client.deleteCollection(CATALOG_COLLECTION);
    await this.client.deleteCollection(CONTENT_COLLECTION);
    this.catalog = this.client.getOrCreateCollection(CATALOG_COLLECTION);
    this.content = this.client.getOrCreateCollection(CONTENT_COLLECTION);
    this.log.info('Cleared all course data');
  }

  // ===========================================================================
  // Point Lookups
  // ===========================================================================

  async getExistingCourseTitles(): Promise<string[]> {
    const entries = await this.catalog.get();
    return entries.map((entry) => entry.id);
  }

  getCourseCount(): Promise<number> {
    return this.catalog.count();
  }

  async getCourseLink(courseTitle: string): Promise<string | null> {
    const [entry] = await this.catalog.get([courseTitle]);
    return entry ? stringOrNull(entry.metadata.course_link) : null;
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
    const [entry] = await this.catalog.get([courseTitle]);
    if (!entry) return null;
    const lesson = parseLessons(entry.metadata.lessons_json).find(
      (l) => l.lesson_number === lessonNumber
    );
    return lesson?.lesson_link ?? null;
  }

  async getCourseMetadata(courseTitle: string): Promise<CourseMetadata | null> {
    const [entry] = await this.catalog.get([courseTitle]);
    return entry ? this.toCourseMetadata(entry.id, entry.metadata) : null;
  }

  async getAllCoursesMetadata(): Promise<CourseMetadata[]> {
    const entries = await this.catalog.get();
    return entries.map((entry) => this.toCourseMetadata(entry.id, entry.metadata));
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private buildFilter(courseTitle: string | null, lessonNumber?: number): WhereFilter | undefined {
    if (courseTitle && lessonNumber !== undefined) {
      return { $and: [{ course_title: courseTitle }, { lesson_number: lessonNumber }] };
    }
    if (courseTitle) return { course_title: courseTitle };
    if (lessonNumber !== undefined) return { lesson_number: lessonNumber };
    return undefined;
  }

  private toCourseMetadata(id: string, metadata: Metadata): CourseMetadata {
    const lessons = parseLessons(metadata.lessons_json);
    return {
      title: stringOrNull(metadata.title) ?? id,
      instructor: stringOrNull(metadata.instructor),
      courseLink: stringOrNull(metadata.course_link),
      lessonCount: typeof metadata.lesson_count === 'number' ? metadata.lesson_count : lessons.length,
      lessons,
    };
  }
}
