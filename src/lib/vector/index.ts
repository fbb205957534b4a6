/**
 * Vector engine exports and selection.
 */

import type { AppConfig } from '@/lib/config';
import { logger } from '@/lib/logger';
import type { EmbeddingProvider } from '@/lib/rag/embeddings';
import { LocalVectorClient } from './local-client';
import { createPgVectorClient } from './pg-client';
import type { VectorClient } from './types';

export * from './types';
export { LocalVectorClient, cosineDistance, type LocalVectorClientOptions } from './local-client';
export { PgVectorClient, createPgVectorClient } from './pg-client';

/**
 * pgvector when a database is configured, otherwise the local engine
 * persisting under the configured path.
 */
export function createVectorClient(
  config: Pick<AppConfig, 'databaseUrl' | 'vectorStorePath'>,
  embedder: EmbeddingProvider
): VectorClient {
  if (config.databaseUrl) {
    logger.info({ engine: 'pgvector' }, 'Using vector engine');
    return createPgVectorClient(config.databaseUrl, embedder);
  }

  logger.info({ engine: 'local', path: config.vectorStorePath }, 'Using vector engine');
  return new LocalVectorClient(embedder, { path: config.vectorStorePath });
}
