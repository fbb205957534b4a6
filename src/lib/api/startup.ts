/**
 * Startup ingestion: index the bundled course documents before serving.
 */

import { logger, errorMessage } from '@/lib/logger';
import type { FolderIngestResult, RAGService } from '@/lib/rag/service';

const log = logger.child({ layer: 'ingestion', service: 'Startup' });

/**
 * Ingest every document under `docsPath`, keeping courses already indexed.
 * A failure is logged and the service starts with whatever is indexed.
 */
export async function loadStartupDocuments(
  service: RAGService,
  docsPath: string
): Promise<FolderIngestResult> {
  log.info({ docsPath }, 'Loading initial documents');

  try {
    const result = await service.addCourseFolder(docsPath, { clearExisting: false });
    log.info({ courses: result.courses, chunks: result.chunks }, 'Initial documents loaded');
    return result;
  } catch (error) {
    log.error({ docsPath, error: errorMessage(error) }, 'Failed to load initial documents');
    return { courses: 0, chunks: 0 };
  }
}
