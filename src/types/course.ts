/**
 * Course domain types.
 *
 * A Course is parsed once from a document and never mutated afterwards;
 * its chunks are what the content index embeds.
 */

export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink: string | null;
}

export interface Course {
  /** Unique key across the catalog */
  title: string;
  courseLink: string | null;
  instructor: string | null;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber: number | null;
  /** Sequential across the whole source document, starting at 0 */
  chunkIndex: number;
}

/**
 * Attribution entry returned alongside an answer.
 */
export interface Source {
  text: string;
  url: string | null;
}

/**
 * Serialized lesson entry stored in catalog metadata.
 */
export interface LessonMetadata {
  lesson_number: number;
  lesson_title: string;
  lesson_link: string | null;
}

export interface CourseMetadata {
  title: string;
  instructor: string | null;
  courseLink: string | null;
  lessonCount: number;
  lessons: LessonMetadata[];
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}
