/**
 * Document Processor
 *
 * Turns a course document into a Course and its ordered chunk sequence.
 *
 * Expected layout (every part optional):
 *
 *   Course Title: <title>
 *   Course Link: <url>
 *   Course Instructor: <name>
 *
 *   Lesson 0: <lesson title>
 *   Lesson Link: <url>
 *   <lesson body...>
 *
 * Malformed structure never raises; missing parts fall back to defaults.
 */

import { basename, extname } from 'path';
import type { Course, CourseChunk, Lesson } from '@/types/course';
import { logger, errorMessage } from '@/lib/logger';
import { readDocumentFile } from '@/lib/parsers';
import { chunkText, estimateTokens, type ChunkOptions } from './chunker';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './config';

// =============================================================================
// Types
// =============================================================================

export interface ProcessedDocument {
  course: Course;
  chunks: CourseChunk[];
}

interface LessonBlock {
  lessonNumber: number | null;
  lines: string[];
}

// =============================================================================
// Patterns
// =============================================================================

const HEADER_PATTERN = /^Course\s+(Title|Link|Instructor):\s*(.*)$/i;
const LESSON_PATTERN = /^Lesson\s+(\d+):\s*(.+)$/i;
const LESSON_LINK_PATTERN = /^Lesson\s+Link:\s*(.*)$/i;

// =============================================================================
// Document Processor
// =============================================================================

export class DocumentProcessor {
  private readonly options: ChunkOptions;
  private log = logger.child({ layer: 'ingestion', service: 'DocumentProcessor' });

  constructor(options: Partial<ChunkOptions> = {}) {
    this.options = {
      chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
      chunkOverlap: options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP,
    };
  }

  /**
   * Read a document from disk. Undecodable bytes are replaced rather than raising.
   */
  async readFile(filePath: string): Promise<string> {
    const result = await readDocumentFile(filePath);
    if (result.metadata.lossy) {
      this.log.warn({ file: basename(filePath) }, 'Document contained invalid UTF-8');
    }
    return result.content;
  }

  /**
   * Sentence-aware chunking with this processor's size and overlap.
   */
  chunkText(text: string): string[] {
    return chunkText(text, this.options);
  }

  /**
   * Parse document text into course metadata and chunks.
   *
   * @param fallbackTitle - Used when the document yields no title at all
   */
  parseCourseDocument(text: string, fallbackTitle: string): ProcessedDocument {
    const lines = text.split(/\r?\n/);
    let cursor = 0;

    let title: string | null = null;
    let courseLink: string | null = null;
    let instructor: string | null = null;
    let sawTitleMarker = false;

    // Header block
    for (; cursor < lines.length; cursor++) {
      const line = lines[cursor].trim();
      if (!line) continue;
      const header = HEADER_PATTERN.exec(line);
      if (!header) break;

      const value = header[2].trim() || null;
      switch (header[1].toLowerCase()) {
        case 'title':
          sawTitleMarker = true;
          title = value;
          break;
        case 'link':
          courseLink = value;
          break;
        case 'instructor':
          instructor = value;
          break;
      }
    }

    // Without a title marker the first non-empty, non-lesson line is the title
    if (!sawTitleMarker) {
      while (cursor < lines.length && !lines[cursor].trim()) cursor++;
      const candidate = cursor < lines.length ? lines[cursor].trim() : '';
      if (candidate && !LESSON_PATTERN.test(candidate)) {
        title = candidate;
        cursor++;
      }
    }

    const courseTitle = title ?? fallbackTitle;
    const { lessons, blocks } = this.splitLessons(lines.slice(cursor));

    const course: Course = { title: courseTitle, courseLink, instructor, lessons };
    const chunks = this.buildChunks(courseTitle, blocks, lessons.length > 0);

    this.log.debug(
      {
        course: courseTitle,
        lessons: lessons.length,
        chunks: chunks.length,
        tokens: chunks.reduce((sum, chunk) => sum + estimateTokens(chunk.content), 0),
      },
      'Document parsed'
    );

    return { course, chunks };
  }

  /**
   * Read and parse a document file. The file stem is the fallback title.
   */
  async processCourseDocument(filePath: string): Promise<ProcessedDocument> {
    const fallbackTitle = basename(filePath, extname(filePath));
    try {
      const text = await this.readFile(filePath);
      return this.parseCourseDocument(text, fallbackTitle);
    } catch (error) {
      this.log.error({ file: basename(filePath), error: errorMessage(error) }, 'Failed to process document');
      throw error;
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private splitLessons(bodyLines: string[]): { lessons: Lesson[]; blocks: LessonBlock[] } {
    const lessons: Lesson[] = [];
    const blocks: LessonBlock[] = [{ lessonNumber: null, lines: [] }];
    let current = blocks[0];
    let expectLink = false;

    for (const raw of bodyLines) {
      const line = raw.trim();

      const lessonMatch = LESSON_PATTERN.exec(line);
      if (lessonMatch) {
        const lesson: Lesson = {
          lessonNumber: Number.parseInt(lessonMatch[1], 10),
          title: lessonMatch[2].trim(),
          lessonLink: null,
        };
        lessons.push(lesson);
        current = { lessonNumber: lesson.lessonNumber, lines: [] };
        blocks.push(current);
        expectLink = true;
        continue;
      }

      if (expectLink && line) {
        expectLink = false;
        const linkMatch = LESSON_LINK_PATTERN.exec(line);
        if (linkMatch) {
          lessons[lessons.length - 1].lessonLink = linkMatch[1].trim() || null;
          continue;
        }
      }

      current.lines.push(raw);
    }

    return { lessons, blocks };
  }

  private buildChunks(courseTitle: string, blocks: LessonBlock[], hasLessons: boolean): CourseChunk[] {
    const chunks: CourseChunk[] = [];
    const lastLessonBlock = hasLessons ? blocks[blocks.length - 1] : blocks[0];

    for (const block of blocks) {
      const pieces = this.chunkText(block.lines.join('\n'));

      pieces.forEach((piece, index) => {
        let content = piece;
        if (block === lastLessonBlock) {
          content = block.lessonNumber === null
            ? `Course ${courseTitle} content: ${piece}`
            : `Course ${courseTitle} Lesson ${block.lessonNumber} content: ${piece}`;
        } else if (block.lessonNumber !== null && index === 0) {
          content = `Lesson ${block.lessonNumber} content: ${piece}`;
        }

        chunks.push({
          content,
          courseTitle,
          lessonNumber: block.lessonNumber,
          chunkIndex: chunks.length,
        });
      });
    }

    return chunks;
  }
}
