/**
 * Course Resolver
 *
 * Maps a free-text course name ("ML", "the MCP course") to a canonical
 * catalog title by nearest-neighbor lookup over title embeddings.
 */

import { logger, errorMessage } from '@/lib/logger';
import type { VectorCollection } from '@/lib/vector/types';

export interface CourseResolverOptions {
  /**
   * Reject the top hit when its cosine distance exceeds this value.
   * Unset accepts any hit.
   */
  maxCourseDistance?: number;
}

export class CourseResolver {
  private log = logger.child({ layer: 'rag', service: 'CourseResolver' });

  /**
   * @param catalog - Returns the current catalog collection; it is replaced on clear
   */
  constructor(
    private readonly catalog: () => VectorCollection,
    private readonly options: CourseResolverOptions = {}
  ) {}

  /**
   * Canonical title for a course name, or null when nothing matches.
   */
  async resolve(courseName: string): Promise<string | null> {
    try {
      const [top] = await this.catalog().query(courseName, 1);
      if (!top) {
        this.log.debug({ courseName }, 'Catalog is empty');
        return null;
      }

      const { maxCourseDistance } = this.options;
      if (maxCourseDistance !== undefined && top.distance > maxCourseDistance) {
        this.log.debug({ courseName, candidate: top.id, distance: top.distance }, 'Closest course too distant');
        return null;
      }

      this.log.debug({ courseName, resolved: top.id, distance: top.distance }, 'Course resolved');
      return top.id;
    } catch (error) {
      this.log.error({ courseName, error: errorMessage(error) }, 'Course resolution failed');
      return null;
    }
  }
}
