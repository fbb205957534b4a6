/**
 * Tests for the semantic index facade
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Course, CourseChunk } from '@/types/course';
import { LocalVectorClient } from '@/lib/vector/local-client';
import type { VectorClient, VectorCollection } from '@/lib/vector/types';
import { VectorStore, contentId, parseLessons } from '../vector-store';
import { HashingEmbedder } from './fakes';

// =============================================================================
// Fixtures
// =============================================================================

const mlCourse: Course = {
  title: 'Machine Learning 101',
  courseLink: 'https://example.com/ml',
  instructor: 'Test Instructor',
  lessons: [
    { lessonNumber: 0, title: 'Intro', lessonLink: 'https://example.com/ml/0' },
    { lessonNumber: 1, title: 'Regression', lessonLink: null },
  ],
};

const serverCourse: Course = {
  title: 'Building Servers',
  courseLink: null,
  instructor: null,
  lessons: [],
};

const mlChunks: CourseChunk[] = [
  { content: 'Supervised learning uses labeled data', courseTitle: mlCourse.title, lessonNumber: 0, chunkIndex: 0 },
  { content: 'Linear regression fits a line', courseTitle: mlCourse.title, lessonNumber: 1, chunkIndex: 1 },
];

const serverChunks: CourseChunk[] = [
  { content: 'Servers answer requests over HTTP', courseTitle: serverCourse.title, lessonNumber: null, chunkIndex: 0 },
];

/**
 * Client whose content collection fails every query.
 */
function failingContentClient(inner: VectorClient): VectorClient {
  return {
    getOrCreateCollection(name: string): VectorCollection {
      const collection = inner.getOrCreateCollection(name);
      if (name !== 'course_content') return collection;
      return {
        name,
        add: (records) => collection.add(records),
        upsert: (records) => collection.upsert(records),
        get: (ids) => collection.get(ids),
        count: () => collection.count(),
        query: async () => {
          throw new Error('index unavailable');
        },
      };
    },
    deleteCollection: (name) => inner.deleteCollection(name),
  };
}

// =============================================================================
// Tests
// =============================================================================

describe('VectorStore', () => {
  let embedder: HashingEmbedder;
  let client: LocalVectorClient;
  let store: VectorStore;

  beforeEach(() => {
    embedder = new HashingEmbedder();
    client = new LocalVectorClient(embedder);
    store = new VectorStore(client, { maxResults: 5 });
  });

  async function ingestBoth(): Promise<void> {
    await store.addCourseMetadata(mlCourse);
    await store.addCourseContent(mlChunks);
    await store.addCourseMetadata(serverCourse);
    await store.addCourseContent(serverChunks);
  }

  describe('search', () => {
    beforeEach(ingestBoth);

    it('should return the nearest chunks with their metadata', async () => {
      const results = await store.search({ query: 'linear regression line', limit: 1 });

      expect(results.error).toBeNull();
      expect(results.documents).toEqual(['Linear regression fits a line']);
      expect(results.metadata).toEqual([
        { courseTitle: 'Machine Learning 101', lessonNumber: 1, chunkIndex: 1 },
      ]);
      expect(results.distances).toHaveLength(1);
    });

    it('should respect the configured result limit', async () => {
      const limited = new VectorStore(client, { maxResults: 2 });
      const results = await limited.search({ query: 'data' });

      expect(results.documents).toHaveLength(2);
    });

    it('should return only chunks of the requested lesson', async () => {
      const results = await store.search({ query: 'regression', lessonNumber: 0 });

      expect(results.documents).toEqual(['Supervised learning uses labeled data']);
    });

    it('should scope to the resolved course', async () => {
      const results = await store.search({ query: 'learning data', courseName: 'Building Servers' });

      expect(results.documents).toEqual(['Servers answer requests over HTTP']);
      expect(results.metadata[0]).toEqual({ courseTitle: 'Building Servers', lessonNumber: null, chunkIndex: 0 });
    });

    it('should combine course and lesson filters', async () => {
      const results = await store.search({
        query: 'learning',
        courseName: 'Machine Learning 101',
        lessonNumber: 1,
      });

      expect(results.documents).toEqual(['Linear regression fits a line']);
    });

    it('should return empty results for a lesson with no chunks', async () => {
      const results = await store.search({ query: 'anything', lessonNumber: 9 });

      expect(results).toEqual({ documents: [], metadata: [], distances: [], error: null });
    });
  });

  it('should not search content when the course does not resolve', async () => {
    await store.addCourseContent(mlChunks);
    embedder.calls.length = 0;

    const results = await store.search({ query: 'regression', courseName: 'Anything' });

    expect(results).toEqual({
      documents: [],
      metadata: [],
      distances: [],
      error: "No course found matching 'Anything'",
    });
    expect(embedder.calls).toEqual([]);
  });

  it('should report engine failures as search errors', async () => {
    const failing = new VectorStore(failingContentClient(client));

    const results = await failing.search({ query: 'regression' });

    expect(results.error).toBe('Search error: index unavailable');
    expect(results.documents).toEqual([]);
  });

  it('should skip empty content writes', async () => {
    await store.addCourseContent([]);
    expect(embedder.calls).toEqual([]);
  });

  it('should key content by course title and chunk index', async () => {
    await store.addCourseContent(serverChunks);

    const records = await client.getOrCreateCollection('course_content').get();
    expect(records).toEqual([
      {
        id: 'Building%20Servers_0',
        document: 'Servers answer requests over HTTP',
        metadata: { course_title: 'Building Servers', chunk_index: 0 },
      },
    ]);
  });

  it('should store catalog metadata with serialized lessons', async () => {
    await store.addCourseMetadata(mlCourse);

    const [entry] = await client.getOrCreateCollection('course_catalog').get(['Machine Learning 101']);
    expect(entry).toEqual({
      id: 'Machine Learning 101',
      document: 'Machine Learning 101',
      metadata: {
        title: 'Machine Learning 101',
        instructor: 'Test Instructor',
        course_link: 'https://example.com/ml',
        lesson_count: 2,
        lessons_json: JSON.stringify([
          { lesson_number: 0, lesson_title: 'Intro', lesson_link: 'https://example.com/ml/0' },
          { lesson_number: 1, lesson_title: 'Regression', lesson_link: null },
        ]),
      },
    });
  });

  describe('point lookups', () => {
    beforeEach(ingestBoth);

    it('should list titles and count courses', async () => {
      expect(await store.getExistingCourseTitles()).toEqual(['Machine Learning 101', 'Building Servers']);
      expect(await store.getCourseCount()).toBe(2);
    });

    it('should look up course links', async () => {
      expect(await store.getCourseLink('Machine Learning 101')).toBe('https://example.com/ml');
      expect(await store.getCourseLink('Building Servers')).toBeNull();
      expect(await store.getCourseLink('Missing')).toBeNull();
    });

    it('should look up lesson links', async () => {
      expect(await store.getLessonLink('Machine Learning 101', 0)).toBe('https://example.com/ml/0');
      expect(await store.getLessonLink('Machine Learning 101', 1)).toBeNull();
      expect(await store.getLessonLink('Machine Learning 101', 5)).toBeNull();
      expect(await store.getLessonLink('Missing', 0)).toBeNull();
    });

    it('should return metadata for every course', async () => {
      expect(await store.getAllCoursesMetadata()).toEqual([
        {
          title: 'Machine Learning 101',
          instructor: 'Test Instructor',
          courseLink: 'https://example.com/ml',
          lessonCount: 2,
          lessons: [
            { lesson_number: 0, lesson_title: 'Intro', lesson_link: 'https://example.com/ml/0' },
            { lesson_number: 1, lesson_title: 'Regression', lesson_link: null },
          ],
        },
        { title: 'Building Servers', instructor: null, courseLink: null, lessonCount: 0, lessons: [] },
      ]);
    });

    it('should clear both collections', async () => {
      await store.clearAllData();

      expect(await store.getCourseCount()).toBe(0);
      expect((await store.search({ query: 'regression' })).documents).toEqual([]);
    });

    it('should accept new data after clearing', async () => {
      await store.clearAllData();
      await store.addCourseMetadata(serverCourse);

      expect(await store.getExistingCourseTitles()).toEqual(['Building Servers']);
    });
  });
});

describe('contentId', () => {
  it('should percent-encode the title', () => {
    expect(contentId({ courseTitle: 'Intro to MCP', chunkIndex: 3 })).toBe('Intro%20to%20MCP_3');
  });

  it('should keep titles differing only in spaces and underscores apart', () => {
    expect(contentId({ courseTitle: 'Intro ML', chunkIndex: 0 })).toBe('Intro%20ML_0');
    expect(contentId({ courseTitle: 'Intro_ML', chunkIndex: 0 })).toBe('Intro_ML_0');
  });
});

describe('parseLessons', () => {
  it('should read malformed data as no lessons', () => {
    expect(parseLessons('not json')).toEqual([]);
    expect(parseLessons('{"lesson_number":1}')).toEqual([]);
    expect(parseLessons(undefined)).toEqual([]);
  });
});
